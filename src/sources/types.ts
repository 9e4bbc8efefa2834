import type { DedupCache } from "../cache/dedupCache.js";
import type { HttpFetcher } from "../client/http.js";
import type { SourceSettings } from "../config.js";
import type { Opportunity, SourceName } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

/**
 * Caller preferences that shape queries and relevance filters.
 */
export interface DiscoveryProfile {
  /** Search terms for sources that accept a query (GitHub, Upwork, Remotive...). */
  skills?: string[];
  /** Added to every keyword-filtered source's relevance list. */
  keywords?: string[];
  /** Raises, never lowers, each source's minimum value. */
  minValue?: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Invoked for each accepted record as soon as it is accepted. */
  onOpportunity?: (opportunity: Opportunity) => void;
}

/**
 * One platform integration. `fetch` resolves with whatever it managed to
 * collect and is not expected to reject.
 */
export interface OpportunitySource {
  readonly name: SourceName;
  fetch(profile: DiscoveryProfile, options?: FetchOptions): Promise<Opportunity[]>;
}

export interface AdapterContext {
  http: HttpFetcher;
  cache: DedupCache;
  logger: Logger;
  settings: SourceSettings;
  now?: () => Date;
  /** Overrides every adapter's own pause between sub-requests. */
  pauseMs?: number;
}
