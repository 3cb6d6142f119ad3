import { withRetry, type RetryPolicy } from "@/lib/retry";

import { companyKey, companyRecordSchema, type CompanyDirectory, type CompanyRecord } from "./types";

export type CompanyIngestResult = {
  ingested: number;
  rejected: number;
  /** Records later in the batch that overwrote an earlier one with the same key. */
  duplicates: number;
};

/**
 * Validate a listings refresh and write it to the directory. Records without
 * any identifier are rejected; nothing is ever deleted.
 */
export async function upsertCompanies(
  directory: CompanyDirectory,
  rows: unknown[],
  opts?: { retry?: Partial<RetryPolicy> },
): Promise<CompanyIngestResult> {
  const byKey = new Map<string, CompanyRecord>();
  let rejected = 0;
  let duplicates = 0;

  for (const row of rows) {
    const parsed = companyRecordSchema.safeParse(row);
    if (!parsed.success) {
      rejected += 1;
      continue;
    }
    const key = companyKey(parsed.data);
    if (byKey.has(key)) duplicates += 1;
    byKey.set(key, parsed.data);
  }

  const records = [...byKey.values()];
  if (records.length === 0) return { ingested: 0, rejected, duplicates };

  const ingested = await withRetry(() => directory.upsert(records), {
    ...opts?.retry,
    label: "company directory upsert",
  });

  if (rejected > 0) {
    console.warn(`[companies] Rejected ${rejected} record(s) without any identifier.`);
  }
  return { ingested, rejected, duplicates };
}
