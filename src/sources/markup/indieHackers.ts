import { load } from "cheerio";
import { MarkupChangedError } from "../../util/errors.js";
import { collapseWhitespace } from "../../transform/text.js";

/**
 * Every structural assumption about the IndieHackers feed page lives here.
 */
export const INDIE_HACKERS_SELECTORS = {
  item: ".feed-item",
  title: "h3",
  link: "a",
} as const;

export interface IndieHackersListing {
  title: string;
  url: string;
}

/**
 * Extract listings from the feed page. A non-empty page with no listing
 * blocks means the markup changed, which is reported instead of returning
 * an empty list.
 */
export function parseIndieHackersFeed(
  html: string,
  baseUrl: string,
  limit = 20
): IndieHackersListing[] {
  const $ = load(html);
  const items = $(INDIE_HACKERS_SELECTORS.item);

  if (items.length === 0) {
    if (html.trim().length > 0) {
      throw new MarkupChangedError("indiehackers", INDIE_HACKERS_SELECTORS.item);
    }
    return [];
  }

  const listings: IndieHackersListing[] = [];
  items.slice(0, limit).each((_, element) => {
    const item = $(element);
    const title = collapseWhitespace(item.find(INDIE_HACKERS_SELECTORS.title).first().text());
    const href = item.find(INDIE_HACKERS_SELECTORS.link).first().attr("href");
    if (!title || !href || !URL.canParse(href, baseUrl)) return;

    listings.push({ title, url: new URL(href, baseUrl).toString() });
  });
  return listings;
}
