import { createHash } from "node:crypto";
import { extractBudgetDetailed } from "./budget.js";
import {
  DEFAULT_ESTIMATED_VALUE,
  DESCRIPTION_MAX_LENGTH,
  Opportunity,
  type OpportunityExtras,
  type SourceName,
  type ValueSource,
} from "./schema.js";
import { collapseWhitespace, truncate } from "./text.js";
import { toISOString } from "../util/time.js";

/**
 * Adapter-side view of a candidate before normalization.
 */
export interface OpportunityDraft {
  source: SourceName;
  nativeId: string;
  title: string;
  description?: string | null;
  url: string;
  type: string;
  /** Amount reported by the platform itself (bounty, salary). */
  platformValue?: number | null;
  /** Text handed to the budget extractor when the platform reports no amount. */
  valueText?: string;
  createdAt?: string | Date | null;
  extras?: OpportunityExtras;
}

export interface ResolvedValue {
  estimatedValue: number;
  valueSource: ValueSource;
}

/**
 * Stable identifier for items that have no platform ID: first 12 hex chars of an MD5.
 */
export function contentHash(value: string): string {
  return createHash("md5").update(value).digest("hex").slice(0, 12);
}

/**
 * Coerce salary/bounty fields that arrive as numbers or numeric strings.
 */
export function toMoney(value: unknown): number | null {
  const amount =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number.parseFloat(value.replace(/[$,\s]/g, ""))
        : NaN;
  if (!Number.isFinite(amount) || amount <= 0) return null;
  return Math.min(Math.floor(amount), Number.MAX_SAFE_INTEGER);
}

export function resolveValue(
  platformValue: number | null | undefined,
  valueText: string | undefined
): ResolvedValue {
  const fromPlatform = toMoney(platformValue);
  if (fromPlatform !== null) {
    return { estimatedValue: fromPlatform, valueSource: "platform" };
  }

  if (valueText) {
    const estimate = extractBudgetDetailed(valueText);
    if (estimate.pattern !== null) {
      return { estimatedValue: estimate.value, valueSource: "extracted" };
    }
  }

  return { estimatedValue: DEFAULT_ESTIMATED_VALUE, valueSource: "default" };
}

const TEXT_EXTRAS = ["company", "subreddit", "category", "author", "location"] as const;

type MutableExtras = { -readonly [K in keyof OpportunityExtras]: OpportunityExtras[K] };

function compactExtras(extras: OpportunityExtras | undefined): OpportunityExtras | undefined {
  if (!extras) return undefined;

  const compacted: MutableExtras = {};
  for (const key of TEXT_EXTRAS) {
    const value = extras[key]?.trim();
    if (value) compacted[key] = value;
  }
  if (extras.tags && extras.tags.length > 0) {
    compacted.tags = extras.tags;
  }

  return Object.keys(compacted).length > 0 ? compacted : undefined;
}

/**
 * Build a validated, frozen Opportunity. Throws a ZodError when the draft
 * cannot satisfy the schema (empty title, relative URL...).
 */
export function toOpportunity(draft: OpportunityDraft, fetchedAt: Date = new Date()): Opportunity {
  const { estimatedValue, valueSource } = resolveValue(draft.platformValue, draft.valueText);
  const extras = compactExtras(draft.extras);

  return Opportunity.parse({
    id: `${draft.source}_${draft.nativeId}`,
    source: draft.source,
    nativeId: draft.nativeId,
    title: collapseWhitespace(draft.title),
    description: truncate(collapseWhitespace(draft.description ?? ""), DESCRIPTION_MAX_LENGTH),
    url: draft.url,
    type: draft.type,
    estimatedValue,
    valueSource,
    createdAt: toISOString(draft.createdAt) ?? fetchedAt.toISOString(),
    ...(extras ? { extras } : {}),
  });
}
