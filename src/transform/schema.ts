import { z } from "zod";

/**
 * Supported platforms, in registration order. Aggregated output follows this order.
 */
export const SOURCE_NAMES = [
  "github",
  "reddit",
  "hackernews",
  "remoteok",
  "remotive",
  "weworkremotely",
  "upwork",
  "stackoverflow",
  "producthunt",
  "indiehackers",
  "linkedin",
  "twitter",
] as const;

export const SourceName = z.enum(SOURCE_NAMES);
export type SourceName = z.infer<typeof SourceName>;

export function isSourceName(value: string): value is SourceName {
  return SourceName.safeParse(value).success;
}

/**
 * Where `estimatedValue` came from: a platform field, the budget extractor,
 * or the placeholder used when neither yields anything.
 */
export const ValueSource = z.enum(["platform", "extracted", "default"]);
export type ValueSource = z.infer<typeof ValueSource>;

export const DESCRIPTION_MAX_LENGTH = 500;
export const DEFAULT_ESTIMATED_VALUE = 500;

export const OpportunityExtras = z
  .object({
    company: z.string().optional(),
    subreddit: z.string().optional(),
    category: z.string().optional(),
    author: z.string().optional(),
    location: z.string().optional(),
    tags: z.array(z.string()).readonly().optional(),
  })
  .readonly();

export type OpportunityExtras = z.infer<typeof OpportunityExtras>;

/**
 * Normalized opportunity schema.
 * Parsing freezes the result; records are never mutated after construction.
 */
export const Opportunity = z
  .object({
    id: z.string().min(1),
    source: SourceName,
    nativeId: z.string().min(1),
    title: z.string().min(1),
    description: z.string().max(DESCRIPTION_MAX_LENGTH),
    url: z.string().url(),
    type: z.string().min(1),
    estimatedValue: z.number().int().nonnegative(),
    valueSource: ValueSource,
    createdAt: z.string().datetime({ offset: true }),
    extras: OpportunityExtras.optional(),
  })
  .readonly()
  .refine((opp) => opp.id === `${opp.source}_${opp.nativeId}`, {
    message: "id must be composed as {source}_{nativeId}",
    path: ["id"],
  });

export type Opportunity = z.infer<typeof Opportunity>;
