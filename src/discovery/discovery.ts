import type { Opportunity, SourceName } from "../transform/schema.js";
import type { DiscoveryProfile, OpportunitySource } from "../sources/types.js";
import { DeadlineError, classifyError, errorMessage } from "../util/errors.js";
import { sourceLogger, type Logger } from "../util/logger.js";
import type { AggregateResult, SourceOutcome } from "./types.js";

export interface DiscoveryOptions {
  /** Registered sources, in registration order. */
  sources: readonly OpportunitySource[];
  /** Default selection when `discover` is called without a source list. Defaults to all. */
  enabled?: readonly SourceName[];
  logger: Logger;
  /** Expired-entry sweep run before each batch. */
  cache?: { sweep(): number };
  adapterDeadlineMs?: number;
  batchDeadlineMs?: number;
  now?: () => Date;
}

export const DEFAULT_ADAPTER_DEADLINE_MS = 60_000;
export const DEFAULT_BATCH_DEADLINE_MS = 120_000;

/**
 * Fans a discovery request out to every selected source and folds the
 * results into one payload. A source that fails, rejects or overruns its
 * deadline only affects its own entry in `bySource`.
 */
export class Discovery {
  private readonly sources: readonly OpportunitySource[];
  private readonly enabled: ReadonlySet<SourceName>;
  private readonly logger: Logger;
  private readonly cache?: { sweep(): number };
  private readonly adapterDeadlineMs: number;
  private readonly batchDeadlineMs: number;
  private readonly now: () => Date;

  constructor(options: DiscoveryOptions) {
    this.sources = options.sources;
    this.enabled = new Set(options.enabled ?? options.sources.map((s) => s.name));
    this.logger = options.logger;
    this.cache = options.cache;
    this.adapterDeadlineMs = options.adapterDeadlineMs ?? DEFAULT_ADAPTER_DEADLINE_MS;
    this.batchDeadlineMs = options.batchDeadlineMs ?? DEFAULT_BATCH_DEADLINE_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sources to run for a request, in registration order. Unknown names are
   * ignored; explicitly requested sources run even when not enabled.
   */
  select(requested?: readonly string[]): OpportunitySource[] {
    if (!requested) {
      return this.sources.filter((source) => this.enabled.has(source.name));
    }

    const wanted = new Set(requested.map((name) => name.trim().toLowerCase()));
    const known = new Set<string>(this.sources.map((source) => source.name));
    const unknown = [...wanted].filter((name) => !known.has(name));
    if (unknown.length > 0) {
      this.logger.warn({ unknown }, "Ignoring unknown sources");
    }

    return this.sources.filter((source) => wanted.has(source.name));
  }

  async discover(
    caller: string,
    profile: DiscoveryProfile = {},
    sources?: readonly string[]
  ): Promise<AggregateResult> {
    const started = Date.now();
    const selected = this.select(sources);

    const swept = this.cache?.sweep() ?? 0;
    this.logger.info(
      { caller, sources: selected.map((s) => s.name), sweptCacheEntries: swept },
      "Starting discovery"
    );

    const batch = new AbortController();
    const batchTimer = setTimeout(
      () => batch.abort(new DeadlineError("batch", this.batchDeadlineMs)),
      this.batchDeadlineMs
    );

    let outcomes: SourceOutcome[];
    try {
      outcomes = await Promise.all(selected.map((source) => this.runSource(source, profile, batch.signal)));
    } finally {
      clearTimeout(batchTimer);
    }

    const bySource: Partial<Record<SourceName, SourceOutcome>> = {};
    const opportunities: Opportunity[] = [];

    selected.forEach((source, index) => {
      const outcome = outcomes[index];
      bySource[source.name] = outcome;
      if (outcome.status !== "error") {
        opportunities.push(...outcome.opportunities);
      }
    });

    const result: AggregateResult = {
      ok: true,
      caller,
      opportunities,
      bySource,
      totalFound: opportunities.length,
      totalValue: opportunities.reduce((sum, opp) => sum + opp.estimatedValue, 0),
      defaultValuedCount: opportunities.filter((opp) => opp.valueSource === "default").length,
      sourcesAttempted: selected.map((source) => source.name),
      completedAt: this.now().toISOString(),
      durationMs: Date.now() - started,
    };

    this.logger.info(
      {
        caller,
        totalFound: result.totalFound,
        totalValue: result.totalValue,
        degraded: selected.filter((_, index) => outcomes[index].status !== "ok").map((s) => s.name),
        durationMs: result.durationMs,
      },
      "Discovery complete"
    );

    return result;
  }

  private async runSource(
    source: OpportunitySource,
    profile: DiscoveryProfile,
    batchSignal: AbortSignal
  ): Promise<SourceOutcome> {
    const started = Date.now();
    const logger = sourceLogger(this.logger, source.name);
    const controller = new AbortController();
    const emitted: Opportunity[] = [];

    const onBatchAbort = (): void => controller.abort(batchSignal.reason);
    if (batchSignal.aborted) onBatchAbort();
    batchSignal.addEventListener("abort", onBatchAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<DeadlineError>((resolve) => {
      if (controller.signal.aborted) {
        resolve(new DeadlineError("batch", this.batchDeadlineMs));
        return;
      }
      timer = setTimeout(() => {
        const reason = new DeadlineError("adapter", this.adapterDeadlineMs);
        controller.abort(reason);
        resolve(reason);
      }, this.adapterDeadlineMs);
      controller.signal.addEventListener(
        "abort",
        () => {
          const reason: unknown = controller.signal.reason;
          resolve(reason instanceof DeadlineError ? reason : new DeadlineError("batch", this.batchDeadlineMs));
        },
        { once: true }
      );
    });

    try {
      const result = await Promise.race([
        source.fetch(profile, {
          signal: controller.signal,
          onOpportunity: (opportunity) => emitted.push(opportunity),
        }),
        deadline,
      ]);
      const durationMs = Date.now() - started;

      if (result instanceof DeadlineError) {
        logger.warn({ collected: emitted.length, durationMs }, result.message);
        return {
          status: "timed_out",
          count: emitted.length,
          opportunities: [...emitted],
          error: result.message,
          durationMs,
        };
      }

      logger.info({ count: result.length, durationMs }, "Source completed");
      return { status: "ok", count: result.length, opportunities: result, durationMs };
    } catch (error) {
      const durationMs = Date.now() - started;
      const errorKind = classifyError(error);
      logger.error({ kind: errorKind, error: errorMessage(error), durationMs }, "Source raised");
      return { status: "error", count: 0, error: errorMessage(error), errorKind, durationMs };
    } finally {
      clearTimeout(timer);
      batchSignal.removeEventListener("abort", onBatchAbort);
    }
  }
}
