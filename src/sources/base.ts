import type { RequestOptions } from "../client/http.js";
import type { SourceSettings } from "../config.js";
import { toOpportunity, type OpportunityDraft } from "../transform/normalize.js";
import type { Opportunity, SourceName } from "../transform/schema.js";
import { containsAny } from "../transform/text.js";
import { classifyError, errorMessage } from "../util/errors.js";
import { sourceLogger, type Logger } from "../util/logger.js";
import { sleep } from "../util/sleep.js";
import type {
  AdapterContext,
  DiscoveryProfile,
  FetchOptions,
  OpportunitySource,
} from "./types.js";

/**
 * State of one adapter invocation: accepted records, filters, and the
 * helpers adapters use to fetch sub-feeds without letting one failure stop
 * the rest.
 */
export class DiscoveryRun {
  readonly accepted: Opportunity[] = [];
  readonly minValue: number;
  readonly logger: Logger;

  constructor(
    readonly source: SourceName,
    readonly profile: DiscoveryProfile,
    private readonly context: AdapterContext,
    private readonly options: FetchOptions
  ) {
    this.logger = sourceLogger(context.logger, source);
    this.minValue = Math.max(context.settings.minValue, profile.minValue ?? 0);
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  get settings(): SourceSettings {
    return this.context.settings;
  }

  now(): Date {
    return this.context.now ? this.context.now() : new Date();
  }

  /**
   * Source keywords plus the profile's own.
   */
  keywords(base: readonly string[]): string[] {
    return [...base, ...(this.profile.keywords ?? [])];
  }

  matches(text: string, keywords: readonly string[]): boolean {
    return containsAny(text, keywords);
  }

  seen(nativeId: string): boolean {
    return this.context.cache.seen(this.source, nativeId);
  }

  /**
   * Dedup, normalize, threshold, then emit. `seen` and `mark` run with no
   * suspension point in between. Once the run is aborted nothing is marked:
   * the caller has already stopped collecting.
   */
  offer(draft: Omit<OpportunityDraft, "source">): boolean {
    if (this.signal?.aborted) {
      this.logger.debug({ nativeId: draft.nativeId }, "Dropped after abort");
      return false;
    }
    if (this.seen(draft.nativeId)) {
      this.logger.debug({ nativeId: draft.nativeId }, "Already surfaced within TTL");
      return false;
    }

    let opportunity: Opportunity;
    try {
      opportunity = toOpportunity({ ...draft, source: this.source }, this.now());
    } catch (error) {
      this.logger.debug({ nativeId: draft.nativeId, error: errorMessage(error) }, "Rejected candidate");
      return false;
    }

    if (opportunity.estimatedValue < this.minValue) {
      this.logger.debug(
        { nativeId: draft.nativeId, estimatedValue: opportunity.estimatedValue, minValue: this.minValue },
        "Below minimum value"
      );
      return false;
    }

    this.context.cache.mark(this.source, opportunity.nativeId);
    this.accepted.push(opportunity);
    this.options.onOpportunity?.(opportunity);
    return true;
  }

  /**
   * Run one sub-request. Failures are logged and yield null so the adapter
   * can move on; an abort is rethrown to end the invocation.
   */
  async step<T>(label: string, fn: () => Promise<T>): Promise<T | null> {
    this.signal?.throwIfAborted();
    try {
      const result = await fn();
      this.signal?.throwIfAborted();
      return result;
    } catch (error) {
      if (this.signal?.aborted) throw error;
      this.logger.warn({ step: label, kind: classifyError(error), error: errorMessage(error) }, "Sub-request failed");
      return null;
    }
  }

  fetchJson(label: string, url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.step(label, () => this.context.http.getJson(url, { ...options, signal: this.signal }));
  }

  fetchText(label: string, url: string, options: RequestOptions = {}): Promise<string | null> {
    return this.step(label, () => this.context.http.getText(url, { ...options, signal: this.signal }));
  }

  pause(ms: number): Promise<void> {
    return sleep(this.context.pauseMs ?? ms, this.signal);
  }
}

/**
 * Base for platform adapters. Subclasses implement `collect`; this class
 * owns the never-reject contract.
 */
export abstract class SourceAdapter implements OpportunitySource {
  abstract readonly name: SourceName;

  constructor(protected readonly context: AdapterContext) {}

  async fetch(profile: DiscoveryProfile, options: FetchOptions = {}): Promise<Opportunity[]> {
    const run = new DiscoveryRun(this.name, profile, this.context, options);
    const started = Date.now();

    run.logger.debug(
      { rateLimitPerHour: this.context.settings.rateLimitPerHour, minValue: run.minValue },
      "Fetching"
    );

    try {
      await this.collect(run);
    } catch (error) {
      if (options.signal?.aborted) {
        run.logger.warn({ collected: run.accepted.length }, "Aborted");
      } else {
        run.logger.error(
          { kind: classifyError(error), error: errorMessage(error), collected: run.accepted.length },
          "Source failed"
        );
      }
    }

    run.logger.info({ count: run.accepted.length, durationMs: Date.now() - started }, "Source done");
    return [...run.accepted];
  }

  protected abstract collect(run: DiscoveryRun): Promise<void>;
}
