import { z } from "zod";

const identifier = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

export const companyRecordSchema = z
  .object({
    companyName: z.string().trim().default(""),
    nseSymbol: identifier,
    bseSymbol: identifier,
    bseCode: identifier,
    isin: identifier,
    industry: identifier,
    status: identifier,
    marketCap: z.number().finite().optional(),
  })
  .refine(
    (c) => Boolean(c.companyName || c.nseSymbol || c.bseSymbol || c.bseCode || c.isin),
    { message: "A company needs at least one of companyName, nseSymbol, bseSymbol, bseCode, isin." },
  );

export type CompanyRecord = z.infer<typeof companyRecordSchema>;

export type MatchKind = "exact" | "trigram" | "substring";

/**
 * Raw match signals a directory reports for one company. Ranking them is the
 * resolver's job, so every backend yields the same order.
 */
export type CompanyCandidate = {
  company: CompanyRecord;
  /** `bseCode` or `isin` equals the query (case-sensitive). */
  exact: boolean;
  /** Best trigram similarity over name, NSE symbol and BSE symbol. */
  similarity: number;
  /** The accent-folded query occurs inside one of those fields. */
  contains: boolean;
};

export type CandidateQuery = {
  query: string;
  limit: number;
  threshold: number;
  signal?: AbortSignal;
};

export interface CompanyDirectory {
  /**
   * Companies that match exactly, reach `threshold` similarity, or contain the
   * query; ordered exact first, then similarity descending, then name.
   */
  findCandidates(query: CandidateQuery): Promise<CompanyCandidate[]>;
  /** Insert or overwrite records; returns how many were written. */
  upsert(records: CompanyRecord[]): Promise<number>;
}

/**
 * Key under which a company's chunks are stored: NSE symbol, else BSE
 * symbol, else BSE code, else ISIN, upper-cased.
 */
export function canonicalSymbol(company: CompanyRecord): string | undefined {
  const key = company.nseSymbol ?? company.bseSymbol ?? company.bseCode ?? company.isin;
  return key?.toUpperCase();
}

/** Key used to recognise the same company across refreshes. */
export function companyKey(company: CompanyRecord): string {
  if (company.isin) return `isin:${company.isin}`;
  if (company.bseCode) return `bse_code:${company.bseCode}`;
  if (company.nseSymbol) return `nse:${company.nseSymbol.toUpperCase()}`;
  if (company.bseSymbol) return `bse:${company.bseSymbol.toUpperCase()}`;
  return `name:${company.companyName.toLowerCase()}`;
}
