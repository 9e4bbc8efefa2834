import { contentHash } from "../transform/normalize.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import { parseIndieHackersFeed } from "./markup/indieHackers.js";

export const INDIE_HACKERS_BASE_URL = "https://www.indiehackers.com";
export const INDIE_HACKERS_FEED_URL = `${INDIE_HACKERS_BASE_URL}/feed`;

const KEYWORDS = ["looking for", "need help", "co-founder", "cofounder", "partner", "collaborate"];

/**
 * Scraped community feed. Selectors are isolated in the markup parser; a
 * page that no longer matches them surfaces as a markup error in the logs.
 */
export class IndieHackersAdapter extends SourceAdapter {
  readonly name = "indiehackers" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const html = await run.fetchText("feed page", INDIE_HACKERS_FEED_URL);
    if (html === null) return;

    const listings = await run.step("parse feed page", async () =>
      parseIndieHackersFeed(html, INDIE_HACKERS_BASE_URL)
    );
    if (listings === null) return;

    const keywords = run.keywords(KEYWORDS);

    for (const listing of listings) {
      if (!run.matches(listing.title, keywords)) continue;

      run.offer({
        nativeId: contentHash(listing.url),
        title: listing.title,
        description: `IndieHackers post: ${listing.title}`,
        url: listing.url,
        type: "collaboration",
        valueText: listing.title,
      });
    }
  }
}
