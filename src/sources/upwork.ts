import { contentHash } from "../transform/normalize.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import { lastPathSegment, parseFeed } from "./feeds.js";

export const UPWORK_FEED_URL = "https://www.upwork.com/ab/feed/jobs/rss";

const MAX_ENTRIES = 20;

/**
 * Upwork job links end in a `~0123...` ciphertext that identifies the posting.
 */
export function upworkJobId(link: string, title: string): string {
  const segment = lastPathSegment(link);
  if (segment) {
    const cipher = /~[0-9a-z]+$/i.exec(segment);
    return cipher ? cipher[0] : segment;
  }
  return contentHash(title);
}

/**
 * Public job search feed. The budget is only present inside the description
 * text, so every value goes through the extractor before the minimum-budget check.
 */
export class UpworkAdapter extends SourceAdapter {
  readonly name = "upwork" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const skills = run.profile.skills ?? [];
    const xml = await run.fetchText("job feed", UPWORK_FEED_URL, {
      query: { q: skills.length > 0 ? skills.join(" ") : "general", sort: "recency" },
      accept: "application/rss+xml, application/xml",
    });
    if (xml === null) return;

    const entries = await run.step("parse job feed", () => parseFeed(xml, UPWORK_FEED_URL));
    if (entries === null) return;

    for (const entry of entries.slice(0, MAX_ENTRIES)) {
      run.offer({
        nativeId: upworkJobId(entry.link, entry.title),
        title: entry.title.replace(/\s*-\s*Upwork$/, ""),
        description: entry.description,
        url: entry.link,
        type: "freelance_gig",
        valueText: entry.description,
        createdAt: entry.publishedAt,
        extras: { category: entry.categories[0] },
      });
    }
  }
}
