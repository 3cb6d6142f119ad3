import pLimit from "p-limit";

import { describeError } from "@/lib/errors";
import { normalizeSymbol, type VectorStore } from "@/lib/vector/store";

import type { RawDocument } from "./documents";
import type { IngestionPipeline } from "./pipeline";

/** Loads the current documents of one symbol, e.g. from the news and fundamentals scrapers. */
export type DocumentSource = (symbol: string, signal: AbortSignal) => Promise<RawDocument[]>;

export type RefreshOptions = {
  pipeline: Pick<IngestionPipeline, "ingest">;
  store: Pick<VectorStore, "listSymbols">;
  source: DocumentSource;
  /** Symbols to refresh in addition to those already in the store. */
  extraSymbols?: () => string[] | Promise<string[]>;
  concurrency?: number;
};

export type RefreshReport = {
  symbols: number;
  indexed: number;
  unchanged: number;
  superseded: number;
  failed: string[];
};

export async function refreshOnce(opts: RefreshOptions, signal: AbortSignal): Promise<RefreshReport> {
  const known = await opts.store.listSymbols(signal);
  const extra = (await opts.extraSymbols?.()) ?? [];
  const symbols = [...new Set([...known, ...extra].map(normalizeSymbol).filter(Boolean))].sort();

  const report: RefreshReport = { symbols: symbols.length, indexed: 0, unchanged: 0, superseded: 0, failed: [] };
  const limit = pLimit(opts.concurrency ?? 2);

  await Promise.all(
    symbols.map((symbol) =>
      limit(async () => {
        signal.throwIfAborted();
        try {
          const docs = await opts.source(symbol, signal);
          if (docs.length === 0) {
            console.warn(`[refresh] ${symbol}: source returned no documents; keeping stored chunks.`);
            report.unchanged += 1;
            return;
          }
          const result = await opts.pipeline.ingest(symbol, docs, { signal });
          report[result.status] += 1;
        } catch (err) {
          if (signal.aborted) throw signal.reason;
          report.failed.push(symbol);
          console.error(`[refresh] ${symbol} failed: ${describeError(err)}`);
        }
      }),
    ),
  );

  report.failed.sort();
  return report;
}

export type RefreshHandle = {
  /** Stop scheduling, cancel the run in progress and wait for it to settle. */
  stop(): Promise<void>;
};

/**
 * Re-ingest every known symbol now and then every `intervalMs` after the
 * previous run finished. A failing symbol never stops the loop.
 */
export function startRefreshLoop(
  opts: RefreshOptions & { intervalMs: number; onReport?: (report: RefreshReport) => void },
): RefreshHandle {
  let stopped = false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let controller: AbortController | undefined;
  let running: Promise<void> | undefined;

  const tick = async (): Promise<void> => {
    controller = new AbortController();
    const started = Date.now();
    try {
      const report = await refreshOnce(opts, controller.signal);
      console.log(
        `[refresh] ${report.symbols} symbol(s): ${report.indexed} indexed, ${report.unchanged} unchanged, ` +
          `${report.failed.length} failed in ${Date.now() - started}ms.`,
      );
      opts.onReport?.(report);
    } catch (err) {
      if (!controller.signal.aborted) console.error(`[refresh] Run failed: ${describeError(err)}`);
    } finally {
      controller = undefined;
      if (!stopped) {
        timer = setTimeout(schedule, opts.intervalMs);
        timer.unref?.();
      }
    }
  };

  const schedule = () => {
    running = tick();
  };

  schedule();

  return {
    async stop() {
      stopped = true;
      clearTimeout(timer);
      controller?.abort(new Error("Refresh loop stopped."));
      await running;
    },
  };
}
