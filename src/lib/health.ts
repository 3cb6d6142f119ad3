import type { QdrantAdminClient } from "@/lib/qdrant/client";

export type ServiceHealth = {
  ok: boolean;
  latency_ms: number;
  message?: string;
};

export type HealthProbe = () => Promise<ServiceHealth>;

export type HealthReport = {
  ok: boolean;
  services: Record<string, ServiceHealth>;
};

/** Anything that can run a tagged-template query, such as a postgres.js client. */
export type SqlProbe = (strings: TemplateStringsArray, ...values: never[]) => PromiseLike<unknown>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function timed(check: () => PromiseLike<unknown>): Promise<ServiceHealth> {
  const start = Date.now();
  try {
    await check();
    return { ok: true, latency_ms: Date.now() - start };
  } catch (err) {
    return { ok: false, latency_ms: Date.now() - start, message: errorMessage(err) };
  }
}

export function postgresHealthCheck(sql: SqlProbe): Promise<ServiceHealth> {
  return timed(() => sql`select 1 as ok`);
}

export function qdrantHealthCheck(client: Pick<QdrantAdminClient, "getCollections">): Promise<ServiceHealth> {
  return timed(() => client.getCollections());
}

/** Probe for a backend that lives in this process. */
export async function inProcessHealth(): Promise<ServiceHealth> {
  return { ok: true, latency_ms: 0, message: "in-process" };
}

export async function checkHealth(probes: Record<string, HealthProbe>): Promise<HealthReport> {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]): Promise<[string, ServiceHealth]> => {
      try {
        return [name, await probe()];
      } catch (err) {
        return [name, { ok: false, latency_ms: 0, message: errorMessage(err) }];
      }
    }),
  );
  const services = Object.fromEntries(entries);
  return { ok: entries.every(([, h]) => h.ok), services };
}
