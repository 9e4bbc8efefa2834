import { z } from "zod";
import { htmlToText } from "../transform/text.js";
import { fromEpochSeconds } from "../util/time.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import type { AdapterContext } from "./types.js";

export const STACK_EXCHANGE_FEATURED_URL = "https://api.stackexchange.com/2.3/questions/featured";

const PAGE_SIZE = 30;
const MAX_TAGS = 5;

const FeaturedResponse = z.object({
  items: z.array(z.unknown()),
  quota_remaining: z.number().optional(),
});

const FeaturedQuestion = z.object({
  question_id: z.number(),
  title: z.string(),
  link: z.string(),
  bounty_amount: z.number().optional(),
  creation_date: z.number(),
  tags: z.array(z.string()).default([]),
  owner: z.object({ display_name: z.string().optional() }).optional(),
});

export interface StackOverflowAdapterOptions {
  /** Stack Exchange app key; raises the daily quota, never required. */
  key?: string;
}

/**
 * Questions carrying an open bounty. The bounty (reputation points) is
 * the platform value and is held to the source's minimum.
 */
export class StackOverflowAdapter extends SourceAdapter {
  readonly name = "stackoverflow" as const;
  private readonly key?: string;

  constructor(context: AdapterContext, options: StackOverflowAdapterOptions = {}) {
    super(context);
    this.key = options.key;
  }

  protected async collect(run: DiscoveryRun): Promise<void> {
    const skills = run.profile.skills ?? [];
    const body = await run.fetchJson("featured questions", STACK_EXCHANGE_FEATURED_URL, {
      query: {
        order: "desc",
        sort: "activity",
        site: "stackoverflow",
        pagesize: PAGE_SIZE,
        tagged: skills.length > 0 ? skills.slice(0, MAX_TAGS).join(";") : undefined,
        key: this.key,
      },
    });
    if (body === null) return;

    const response = FeaturedResponse.safeParse(body);
    if (!response.success) {
      run.logger.warn("Unexpected featured response shape");
      return;
    }
    if (response.data.quota_remaining !== undefined) {
      run.logger.debug({ quotaRemaining: response.data.quota_remaining }, "Stack Exchange quota");
    }

    for (const item of response.data.items.slice(0, PAGE_SIZE)) {
      const parsed = FeaturedQuestion.safeParse(item);
      if (!parsed.success) continue;

      const question = parsed.data;
      const bounty = question.bounty_amount ?? 0;
      if (bounty <= 0) continue;

      run.offer({
        nativeId: String(question.question_id),
        title: htmlToText(question.title),
        description: `Open bounty of ${bounty} reputation. Tags: ${question.tags.join(", ")}`,
        url: question.link,
        type: "bounty",
        platformValue: bounty,
        createdAt: fromEpochSeconds(question.creation_date),
        extras: { tags: question.tags, author: question.owner?.display_name },
      });
    }
  }
}
