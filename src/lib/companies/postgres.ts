import { asc, desc, or, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";

import type { Database } from "@/lib/db/client";
import { companies, type CompanyRow } from "@/lib/db/schema";
import { StoreUnavailableError } from "@/lib/errors";

import {
  companyKey,
  type CandidateQuery,
  type CompanyCandidate,
  type CompanyDirectory,
  type CompanyRecord,
} from "./types";

const UPSERT_BATCH = 1000;

/**
 * Statements that make the trigram search fast. Safe to run repeatedly;
 * managed databases may require the extensions to be enabled by an admin.
 */
export const COMPANY_SEARCH_DDL = [
  "create extension if not exists pg_trgm",
  "create extension if not exists unaccent",
  "create index if not exists companies_name_trgm_idx on companies using gin (company_name gin_trgm_ops)",
  "create index if not exists companies_nse_symbol_trgm_idx on companies using gin (nse_symbol gin_trgm_ops)",
  "create index if not exists companies_bse_symbol_trgm_idx on companies using gin (bse_symbol gin_trgm_ops)",
] as const;

export function toCompanyRecord(
  row: Pick<
    CompanyRow,
    "companyName" | "nseSymbol" | "bseSymbol" | "bseCode" | "isin" | "industry" | "status" | "marketCap"
  >,
): CompanyRecord {
  return {
    companyName: row.companyName,
    nseSymbol: row.nseSymbol ?? undefined,
    bseSymbol: row.bseSymbol ?? undefined,
    bseCode: row.bseCode ?? undefined,
    isin: row.isin ?? undefined,
    industry: row.industry ?? undefined,
    status: row.status ?? undefined,
    marketCap: row.marketCap ?? undefined,
  };
}

function folded(column: AnyPgColumn): SQL {
  return sql`lower(unaccent(coalesce(${column}, '')))`;
}

/** pg_trgm + unaccent backed directory over the `companies` table. */
export class PostgresCompanyDirectory implements CompanyDirectory {
  constructor(private readonly db: Database) {}

  async ensureCompanySearch(): Promise<void> {
    for (const statement of COMPANY_SEARCH_DDL) {
      await this.db.execute(sql.raw(statement));
    }
  }

  async findCandidates({ query, limit, threshold }: CandidateQuery): Promise<CompanyCandidate[]> {
    const q = query.trim();
    if (!q) return [];

    const fields = [companies.companyName, companies.nseSymbol, companies.bseSymbol];
    const exact = sql<boolean>`(coalesce(${companies.bseCode} = ${q}, false) or coalesce(${companies.isin} = ${q}, false))`;
    const similarity = sql<number>`greatest(${sql.join(
      fields.map((f) => sql`similarity(unaccent(coalesce(${f}, '')), unaccent(${q}))`),
      sql`, `,
    )})`;
    const score = sql<number>`case when ${exact} then 1 else ${similarity} end`;
    const contains = sql<boolean>`(${sql.join(
      fields.map((f) => sql`strpos(${folded(f)}, lower(unaccent(${q}))) > 0`),
      sql` or `,
    )})`;

    try {
      const rows = await this.db
        .select({
          companyName: companies.companyName,
          nseSymbol: companies.nseSymbol,
          bseSymbol: companies.bseSymbol,
          bseCode: companies.bseCode,
          isin: companies.isin,
          industry: companies.industry,
          status: companies.status,
          marketCap: companies.marketCap,
          exact: exact.mapWith(Boolean),
          similarity: score.mapWith(Number),
          contains: contains.mapWith(Boolean),
        })
        .from(companies)
        .where(or(exact, sql`${similarity} >= ${threshold}`, contains))
        .orderBy(desc(exact), desc(score), asc(companies.companyName))
        .limit(limit);

      return rows.map((r) => ({
        company: toCompanyRecord(r),
        exact: r.exact,
        similarity: r.similarity,
        contains: r.contains,
      }));
    } catch (err) {
      throw new StoreUnavailableError("Company directory query failed.", { cause: err });
    }
  }

  async upsert(records: CompanyRecord[]): Promise<number> {
    let written = 0;
    try {
      for (let i = 0; i < records.length; i += UPSERT_BATCH) {
        const batch = records.slice(i, i + UPSERT_BATCH).map((r) => ({
          companyKey: companyKey(r),
          companyName: r.companyName,
          nseSymbol: r.nseSymbol ?? null,
          bseSymbol: r.bseSymbol ?? null,
          bseCode: r.bseCode ?? null,
          isin: r.isin ?? null,
          industry: r.industry ?? null,
          status: r.status ?? null,
          marketCap: r.marketCap ?? null,
        }));

        await this.db
          .insert(companies)
          .values(batch)
          .onConflictDoUpdate({
            target: companies.companyKey,
            set: {
              companyName: sql`excluded.company_name`,
              nseSymbol: sql`excluded.nse_symbol`,
              bseSymbol: sql`excluded.bse_symbol`,
              bseCode: sql`excluded.bse_code`,
              isin: sql`excluded.isin`,
              industry: sql`excluded.industry`,
              status: sql`excluded.status`,
              marketCap: sql`excluded.market_cap`,
              updatedAt: new Date(),
            },
          });
        written += batch.length;
      }
    } catch (err) {
      throw new StoreUnavailableError("Company directory write failed.", { cause: err });
    }
    return written;
  }
}
