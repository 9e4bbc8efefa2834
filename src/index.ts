import { TtlDedupCache } from "./cache/dedupCache.js";
import { HttpClient } from "./client/http.js";
import { enabledSources, loadConfig } from "./config.js";
import { Discovery } from "./discovery/discovery.js";
import type { AggregateResult } from "./discovery/types.js";
import { createSources } from "./sources/index.js";
import type { DiscoveryProfile } from "./sources/types.js";
import { readCacheState, writeCacheState } from "./state/cacheState.js";
import { writeCsv } from "./storage/writeCsv.js";
import { writeJson, writeSummary } from "./storage/writeJson.js";
import { writeSqlite } from "./storage/writeSqlite.js";
import { errorMessage } from "./util/errors.js";
import { getLogger } from "./util/logger.js";

export interface RunDiscoveryOptions {
  caller?: string;
  sources?: string[];
  profile?: DiscoveryProfile;
  outDir?: string;
  sqlite?: boolean;
  /** Load and persist the dedup cache across runs. Defaults to true. */
  state?: boolean;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Main entry point: build the stack from configuration, run one discovery
 * batch, write outputs and persist the dedup cache.
 */
export async function runDiscovery(options: RunDiscoveryOptions = {}): Promise<AggregateResult> {
  const logger = getLogger(options.verbose ?? false);
  const config = loadConfig(options.env);
  const useState = options.state ?? true;

  const cache = new TtlDedupCache({
    ttlMs: config.cacheTtlHours * 60 * 60 * 1000,
    maxEntries: config.cacheMaxEntries,
  });

  if (useState) {
    try {
      const state = await readCacheState(config.statePath);
      if (state) {
        cache.restore(state.entries);
        logger.info({ statePath: config.statePath, restored: cache.size }, "Restored dedup cache");
      }
    } catch (error) {
      logger.warn(
        { statePath: config.statePath, error: errorMessage(error) },
        "Ignoring unreadable dedup state"
      );
    }
  }

  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    logger,
  });

  const discovery = new Discovery({
    sources: createSources({ config, http, cache, logger }),
    enabled: enabledSources(config),
    cache,
    logger,
    adapterDeadlineMs: config.adapterDeadlineMs,
    batchDeadlineMs: config.batchDeadlineMs,
  });

  const result = await discovery.discover(options.caller ?? "cli", options.profile ?? {}, options.sources);

  const outDir = options.outDir ?? "data";
  await writeJson(result.opportunities, outDir, logger);
  await writeCsv(result.opportunities, outDir, logger);
  await writeSummary(result, outDir, logger);

  if (options.sqlite) {
    await writeSqlite(result.opportunities, outDir, logger);
  }

  if (useState) {
    const state = await writeCacheState(config.statePath, cache.snapshot());
    logger.debug({ statePath: config.statePath, entries: state.entries.length }, "Persisted dedup cache");
  }

  return result;
}

export { loadConfig, enabledSources, DEFAULT_SOURCE_SETTINGS } from "./config.js";
export type { AppConfig, SourceSettings } from "./config.js";
export { Discovery, DEFAULT_ADAPTER_DEADLINE_MS, DEFAULT_BATCH_DEADLINE_MS } from "./discovery/discovery.js";
export type { DiscoveryOptions } from "./discovery/discovery.js";
export type { AggregateResult, SourceOutcome } from "./discovery/types.js";
export { TtlDedupCache, cacheKey } from "./cache/dedupCache.js";
export type { DedupCache, CacheSnapshot } from "./cache/dedupCache.js";
export { HttpClient } from "./client/http.js";
export type { HttpFetcher, RequestOptions } from "./client/http.js";
export { createSources, SourceAdapter, DiscoveryRun } from "./sources/index.js";
export type { AdapterContext, DiscoveryProfile, FetchOptions, OpportunitySource } from "./sources/index.js";
export { Opportunity, SourceName, SOURCE_NAMES, ValueSource } from "./transform/schema.js";
export { toOpportunity } from "./transform/normalize.js";
export type { OpportunityDraft } from "./transform/normalize.js";
export { extractBudget, extractBudgetDetailed } from "./transform/budget.js";
export { classifyError, HttpError, MarkupChangedError, ConfigError, DeadlineError } from "./util/errors.js";
export type { ErrorKind } from "./util/errors.js";
