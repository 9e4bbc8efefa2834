import { contentHash } from "../transform/normalize.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import { parseFeed, type FeedEntry } from "./feeds.js";

export const PRODUCT_HUNT_FEED_URL = "https://www.producthunt.com/feed";

const DAYS_BACK = 7;
const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_ENTRIES = 30;

const NEGATIVE_KEYWORDS = ["giveaway", "crypto airdrop"];

/**
 * Product Hunt guids look like `tag:www.producthunt.com,2005:Post/123456`.
 */
export function productHuntId(entry: FeedEntry): string {
  const match = /Post\/(\d+)/.exec(entry.guid ?? "");
  return match ? match[1] : contentHash(entry.link);
}

/**
 * Recent launches. Teams that just launched are the ones shopping for
 * services, so only the last week of the feed is considered.
 */
export class ProductHuntAdapter extends SourceAdapter {
  readonly name = "producthunt" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const xml = await run.fetchText("launch feed", PRODUCT_HUNT_FEED_URL, {
      accept: "application/atom+xml, application/rss+xml, application/xml",
    });
    if (xml === null) return;

    const entries = await run.step("parse launch feed", () => parseFeed(xml, PRODUCT_HUNT_FEED_URL));
    if (entries === null) return;

    const cutoff = run.now().getTime() - DAYS_BACK * DAY_MS;

    for (const entry of entries.slice(0, MAX_ENTRIES)) {
      const published = entry.publishedAt ? new Date(entry.publishedAt).getTime() : NaN;
      if (!Number.isNaN(published) && published < cutoff) continue;
      if (run.matches(`${entry.title} ${entry.description}`, NEGATIVE_KEYWORDS)) continue;

      run.offer({
        nativeId: productHuntId(entry),
        title: entry.title,
        description: entry.description,
        url: entry.link,
        type: "product_launch",
        valueText: entry.description,
        createdAt: entry.publishedAt,
        extras: { author: entry.author },
      });
    }
  }
}
