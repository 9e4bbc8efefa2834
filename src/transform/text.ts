import { load } from "cheerio";

const BLOCK_BREAK = /<(?:br|p|\/p|li|div|\/div)\b[^>]*>/gi;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Plain text from an HTML fragment: tags dropped, entities decoded,
 * whitespace collapsed.
 */
export function htmlToText(html: string | null | undefined): string {
  if (!html) return "";
  const spaced = html.replace(BLOCK_BREAK, " ");
  return collapseWhitespace(load(spaced, null, false).root().text());
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}
