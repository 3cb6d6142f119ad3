import type {
  CompanyCandidate,
  CompanyDirectory,
  CompanyRecord,
  MatchKind,
} from "@/lib/companies/types";
import { canonicalSymbol } from "@/lib/companies/types";
import { withRetry, type RetryPolicy } from "@/lib/retry";

export type ResolvedCompany = {
  company: CompanyRecord;
  /** Key the company's chunks are stored under, when it has one. */
  symbol?: string;
  matchKind: MatchKind;
  /** 1 for exact identifier matches, otherwise the best trigram similarity. */
  score: number;
};

export type EntityResolverDeps = {
  directory: CompanyDirectory;
  /** Minimum trigram similarity for the fuzzy tier. */
  threshold: number;
  retry?: Partial<RetryPolicy>;
};

const TIER: Record<MatchKind, number> = { exact: 0, trigram: 1, substring: 2 };

function classify(c: CompanyCandidate, threshold: number): MatchKind | null {
  if (c.exact) return "exact";
  if (c.similarity >= threshold) return "trigram";
  if (c.contains) return "substring";
  return null;
}

function compareResolved(a: ResolvedCompany, b: ResolvedCompany): number {
  if (a.matchKind !== b.matchKind) return TIER[a.matchKind] - TIER[b.matchKind];
  if (a.matchKind !== "exact" && a.score !== b.score) return b.score - a.score;
  const an = a.company.companyName;
  const bn = b.company.companyName;
  return an < bn ? -1 : an > bn ? 1 : 0;
}

/**
 * Rank directory candidates: exact `bseCode`/`isin` hits first, then trigram
 * matches by similarity, then substring matches, which only fill the places
 * the first two tiers leave free. Ties fall back to company name.
 */
export function rankCandidates(
  candidates: CompanyCandidate[],
  threshold: number,
  limit: number,
): ResolvedCompany[] {
  const resolved: ResolvedCompany[] = [];
  for (const c of candidates) {
    const matchKind = classify(c, threshold);
    if (!matchKind) continue;
    resolved.push({
      company: c.company,
      symbol: canonicalSymbol(c.company),
      matchKind,
      score: matchKind === "exact" ? 1 : c.similarity,
    });
  }
  return resolved.sort(compareResolved).slice(0, limit);
}

export async function resolveScored(
  deps: EntityResolverDeps,
  query: string,
  opts?: { limit?: number; signal?: AbortSignal },
): Promise<ResolvedCompany[]> {
  const q = query.trim().replace(/\s+/g, " ");
  if (!q) return [];

  const limit = Math.max(1, Math.min(opts?.limit ?? 10, 50));

  const candidates = await withRetry(
    (signal) => deps.directory.findCandidates({ query: q, limit, threshold: deps.threshold, signal }),
    { ...deps.retry, label: "company directory search", signal: opts?.signal },
  );

  return rankCandidates(candidates, deps.threshold, limit);
}

/** Resolve free text (name, symbol, BSE code, ISIN) to company records. */
export async function resolve(
  deps: EntityResolverDeps,
  query: string,
  limit = 10,
  signal?: AbortSignal,
): Promise<CompanyRecord[]> {
  const ranked = await resolveScored(deps, query, { limit, signal });
  return ranked.map((r) => r.company);
}
