import { z } from "zod";
import { fromEpochSeconds } from "../util/time.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import type { AdapterContext } from "./types.js";

export const REDDIT_BASE_URL = "https://www.reddit.com";

export const DEFAULT_SUBREDDITS = [
  "forhire",
  "freelance",
  "startups",
  "entrepreneur",
  "smallbusiness",
  "marketing",
  "webdev",
  "design_critique",
  "reviewmyapp",
  "alphaandbetausers",
  "imadethis",
  "saas",
  "microsaas",
  "indiehackers",
];

const KEYWORDS = ["hiring", "looking for", "need help", "freelancer", "contract", "gig", "opportunity"];

// Self-promotion, not demand
const NEGATIVE_KEYWORDS = ["[for hire]", "hire me", "available for work"];

const MAX_SUBREDDITS = 10;
const POSTS_PER_SUBREDDIT = 25;
const PAUSE_MS = 500;

const RedditListing = z.object({
  data: z.object({
    children: z.array(z.unknown()),
  }),
});

const RedditPost = z.object({
  data: z.object({
    id: z.string(),
    title: z.string(),
    selftext: z.string().default(""),
    permalink: z.string(),
    created_utc: z.number(),
    author: z.string().optional(),
  }),
});

export interface RedditAdapterOptions {
  subreddits?: readonly string[];
}

/**
 * Newest posts across hiring-oriented subreddits via the public JSON listings.
 */
export class RedditAdapter extends SourceAdapter {
  readonly name = "reddit" as const;
  private readonly subreddits: readonly string[];

  constructor(context: AdapterContext, options: RedditAdapterOptions = {}) {
    super(context);
    this.subreddits = (options.subreddits ?? DEFAULT_SUBREDDITS).slice(0, MAX_SUBREDDITS);
  }

  protected async collect(run: DiscoveryRun): Promise<void> {
    const keywords = run.keywords(KEYWORDS);

    for (const [index, subreddit] of this.subreddits.entries()) {
      if (index > 0) await run.pause(PAUSE_MS);

      const body = await run.fetchJson(`r/${subreddit}`, `${REDDIT_BASE_URL}/r/${subreddit}/new.json`, {
        query: { limit: POSTS_PER_SUBREDDIT },
      });
      if (body === null) continue;

      const listing = RedditListing.safeParse(body);
      if (!listing.success) {
        run.logger.warn({ subreddit }, "Unexpected listing shape");
        continue;
      }

      for (const child of listing.data.data.children.slice(0, POSTS_PER_SUBREDDIT)) {
        const post = RedditPost.safeParse(child);
        if (!post.success) continue;

        const { id, title, selftext, permalink, created_utc, author } = post.data.data;
        const text = `${title} ${selftext}`;
        if (!run.matches(text, keywords) || run.matches(text, NEGATIVE_KEYWORDS)) continue;

        run.offer({
          nativeId: id,
          title,
          description: selftext,
          url: `https://reddit.com${permalink}`,
          type: "help_request",
          valueText: text,
          createdAt: fromEpochSeconds(created_utc),
          extras: { subreddit, author },
        });
      }
    }
  }
}
