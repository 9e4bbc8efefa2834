import Parser from "rss-parser";
import { ResponseParseError } from "../util/errors.js";

type NoCustomFields = Record<never, never>;

/** Atom entries carry their identifier in `<id>` rather than `<guid>`. */
interface AtomItemFields {
  id?: string;
}

export interface FeedEntry {
  title: string;
  link: string;
  guid?: string;
  /** Plain-text description (rss-parser strips the HTML into `contentSnippet`). */
  description: string;
  publishedAt?: string;
  categories: string[];
  author?: string;
}

/**
 * Category elements with attributes come back as `{ _, $ }` objects.
 */
function categoryText(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value === "object" && value !== null && "_" in value && typeof value._ === "string") {
    return value._.trim() || undefined;
  }
  return undefined;
}

function categoryList(values: readonly unknown[] | undefined): string[] {
  const categories: string[] = [];
  for (const value of values ?? []) {
    const text = categoryText(value);
    if (text) categories.push(text);
  }
  return categories;
}

const parser = new Parser<NoCustomFields, AtomItemFields>({ customFields: { item: ["id"] } });

/**
 * Parse an RSS/Atom document into entries that carry at least a title and a link.
 */
export async function parseFeed(xml: string, url: string): Promise<FeedEntry[]> {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(xml);
  } catch (error) {
    throw new ResponseParseError(url, error);
  }

  const entries: FeedEntry[] = [];
  for (const item of feed.items) {
    const title = item.title?.trim();
    const link = item.link?.trim();
    if (!title || !link) continue;

    entries.push({
      title,
      link,
      guid: item.guid ?? item.id,
      description: item.contentSnippet ?? item.content ?? item.summary ?? "",
      publishedAt: item.isoDate ?? item.pubDate,
      categories: categoryList(item.categories),
      author: item.creator,
    });
  }
  return entries;
}

/**
 * Last non-empty path segment of a URL, ignoring the query string.
 */
export function lastPathSegment(link: string): string | null {
  if (!URL.canParse(link)) return null;
  const segments = new URL(link).pathname.split("/").filter((s) => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}
