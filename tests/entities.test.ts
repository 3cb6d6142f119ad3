import { afterEach, describe, expect, it, vi } from "vitest";

import { MemoryCompanyDirectory } from "@/lib/companies/memory";
import type { CompanyCandidate, CompanyDirectory, CompanyRecord } from "@/lib/companies/types";
import { StoreUnavailableError } from "@/lib/errors";
import { rankCandidates, resolve, resolveScored } from "@/lib/retrieval/entities";

const tcs: CompanyRecord = {
  companyName: "Tata Consultancy Services",
  nseSymbol: "TCS",
  bseCode: "532540",
  isin: "INE467B01029",
};
const tataMotors: CompanyRecord = {
  companyName: "Tata Motors",
  nseSymbol: "TATAMOTORS",
  bseCode: "500570",
  isin: "INE155A01022",
};
const ventures: CompanyRecord = { companyName: "500570 Ventures", nseSymbol: "V500570" };
const hul: CompanyRecord = { companyName: "Hindustan Unilever", nseSymbol: "HINDUNILVR" };
const leverAyurveda: CompanyRecord = { companyName: "Lever Ayurveda", bseSymbol: "LEVERAYU" };

const fastRetry = { attempts: 3, baseDelayMs: 0, timeoutMs: 1000 };

function deps(companies: CompanyRecord[]) {
  return { directory: new MemoryCompanyDirectory(companies), threshold: 0.3, retry: fastRetry };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolve", () => {
  const all = [tcs, tataMotors, ventures, hul, leverAyurveda];

  it("resolves a symbol to the right company", async () => {
    const out = await resolveScored(deps(all), "TCS");
    expect(out).toEqual([{ company: tcs, symbol: "TCS", matchKind: "trigram", score: 1 }]);
  });

  it("puts exact identifier matches before fuzzy ones", async () => {
    const out = await resolveScored(deps(all), "500570");
    expect(out.map((r) => [r.company.companyName, r.matchKind, r.score])).toEqual([
      ["Tata Motors", "exact", 1],
      ["500570 Ventures", "trigram", 0.5],
    ]);
  });

  it("matches identifiers case-sensitively", async () => {
    expect(await resolve(deps(all), "INE155A01022")).toEqual([tataMotors]);
    expect(await resolve(deps(all), "ine155a01022")).toEqual([]);
  });

  it("only uses substring matches to fill remaining places", async () => {
    const out = await resolveScored(deps(all), "lever");
    expect(out.map((r) => r.company.companyName)).toEqual(["Lever Ayurveda", "Hindustan Unilever"]);
    expect(out[1]?.matchKind).toBe("substring");
    expect(out[1]?.score).toBeCloseTo(4 / 21, 10);

    const top = await resolve(deps(all), "lever", 1);
    expect(top).toEqual([leverAyurveda]);
  });

  it("folds accents in names and queries", async () => {
    const nestle: CompanyRecord = { companyName: "Nestlé India", nseSymbol: "NESTLEIND" };
    const out = await resolve(deps([nestle]), "nestle india");
    expect(out).toEqual([nestle]);
  });

  it("returns nothing for blank queries or no match", async () => {
    expect(await resolve(deps(all), "   ")).toEqual([]);
    expect(await resolve(deps(all), "zzqx")).toEqual([]);
  });

  it("clamps the limit to at least one", async () => {
    expect(await resolve(deps(all), "tata", 0)).toHaveLength(1);
  });

  it("retries an unavailable directory", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const findCandidates = vi
      .fn<CompanyDirectory["findCandidates"]>()
      .mockRejectedValueOnce(new StoreUnavailableError("down"))
      .mockResolvedValueOnce([{ company: tcs, exact: false, similarity: 1, contains: true }]);
    const directory: CompanyDirectory = { findCandidates, upsert: vi.fn() };

    const out = await resolve({ directory, threshold: 0.3, retry: fastRetry }, "TCS");

    expect(out).toEqual([tcs]);
    expect(findCandidates).toHaveBeenCalledTimes(2);
    expect(findCandidates.mock.calls[0]?.[0]).toMatchObject({ query: "TCS", limit: 10, threshold: 0.3 });
  });
});

describe("rankCandidates", () => {
  const candidate = (companyName: string, patch: Partial<CompanyCandidate>): CompanyCandidate => ({
    company: { companyName, isin: `IN${companyName}` },
    exact: false,
    similarity: 0,
    contains: false,
    ...patch,
  });

  it("orders by tier, then similarity, then name", () => {
    const ranked = rankCandidates(
      [
        candidate("Delta", { contains: true, similarity: 0.1 }),
        candidate("Beta", { similarity: 0.5 }),
        candidate("Alpha", { similarity: 0.5 }),
        candidate("Gamma", { similarity: 0.9 }),
        candidate("Zeta", { exact: true }),
        candidate("Eta", { exact: true, similarity: 0.2 }),
        candidate("Omega", { similarity: 0.05 }),
      ],
      0.3,
      10,
    );
    expect(ranked.map((r) => r.company.companyName)).toEqual(["Eta", "Zeta", "Gamma", "Alpha", "Beta", "Delta"]);
    expect(ranked.map((r) => r.symbol)).toEqual(["INETA", "INZETA", "INGAMMA", "INALPHA", "INBETA", "INDELTA"]);
  });

  it("truncates to the limit", () => {
    const ranked = rankCandidates([candidate("B", { similarity: 0.4 }), candidate("A", { exact: true })], 0.3, 1);
    expect(ranked.map((r) => r.matchKind)).toEqual(["exact"]);
  });
});
