import { normalizeForMatch } from "@/lib/text/normalize";
import { trigramSimilarity } from "@/lib/text/trigram";

import {
  companyKey,
  type CandidateQuery,
  type CompanyCandidate,
  type CompanyDirectory,
  type CompanyRecord,
} from "./types";

function compareCandidates(a: CompanyCandidate, b: CompanyCandidate): number {
  if (a.exact !== b.exact) return a.exact ? -1 : 1;
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  const an = a.company.companyName;
  const bn = b.company.companyName;
  return an < bn ? -1 : an > bn ? 1 : 0;
}

/**
 * In-process directory with the same matching rules as the Postgres one.
 * Used for tests and for running without a database.
 */
export class MemoryCompanyDirectory implements CompanyDirectory {
  private readonly companies = new Map<string, CompanyRecord>();

  constructor(seed: CompanyRecord[] = []) {
    for (const c of seed) this.companies.set(companyKey(c), c);
  }

  get size(): number {
    return this.companies.size;
  }

  async findCandidates({ query, limit, threshold }: CandidateQuery): Promise<CompanyCandidate[]> {
    const raw = query.trim();
    const q = normalizeForMatch(raw);
    if (!q) return [];

    const out: CompanyCandidate[] = [];
    for (const company of this.companies.values()) {
      const fields = [company.companyName, company.nseSymbol ?? "", company.bseSymbol ?? ""].map(
        normalizeForMatch,
      );
      const exact = company.bseCode === raw || company.isin === raw;
      const similarity = exact ? 1 : Math.max(...fields.map((f) => trigramSimilarity(f, q)));
      const contains = fields.some((f) => f.length > 0 && f.includes(q));

      if (exact || similarity >= threshold || contains) {
        out.push({ company, exact, similarity, contains });
      }
    }

    return out.sort(compareCandidates).slice(0, limit);
  }

  async upsert(records: CompanyRecord[]): Promise<number> {
    for (const r of records) this.companies.set(companyKey(r), r);
    return records.length;
  }
}
