import { contentHash } from "../transform/normalize.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import { lastPathSegment, parseFeed, type FeedEntry } from "./feeds.js";
import type { AdapterContext } from "./types.js";

export const DEFAULT_WWR_FEEDS = [
  "https://weworkremotely.com/categories/remote-programming-jobs.rss",
  "https://weworkremotely.com/categories/remote-design-jobs.rss",
  "https://weworkremotely.com/categories/remote-devops-sysadmin-jobs.rss",
];

const NEGATIVE_KEYWORDS = ["unpaid", "volunteer", "internship"];

const ENTRIES_PER_FEED = 25;
const PAUSE_MS = 300;

/**
 * WWR titles read "Company: Position".
 */
export function splitCompany(title: string): { company?: string; position: string } {
  const separator = title.indexOf(": ");
  if (separator <= 0) return { position: title };
  return {
    company: title.slice(0, separator).trim(),
    position: title.slice(separator + 2).trim(),
  };
}

export interface WeWorkRemotelyAdapterOptions {
  feeds?: readonly string[];
}

export class WeWorkRemotelyAdapter extends SourceAdapter {
  readonly name = "weworkremotely" as const;
  private readonly feeds: readonly string[];

  constructor(context: AdapterContext, options: WeWorkRemotelyAdapterOptions = {}) {
    super(context);
    this.feeds = options.feeds ?? DEFAULT_WWR_FEEDS;
  }

  protected async collect(run: DiscoveryRun): Promise<void> {
    for (const [index, feedUrl] of this.feeds.entries()) {
      if (index > 0) await run.pause(PAUSE_MS);

      const xml = await run.fetchText(feedUrl, feedUrl, { accept: "application/rss+xml, application/xml" });
      if (xml === null) continue;

      const entries = await run.step(`parse ${feedUrl}`, () => parseFeed(xml, feedUrl));
      if (entries === null) continue;

      for (const entry of entries.slice(0, ENTRIES_PER_FEED)) {
        this.consider(run, entry);
      }
    }
  }

  private consider(run: DiscoveryRun, entry: FeedEntry): void {
    if (run.matches(`${entry.title} ${entry.description}`, NEGATIVE_KEYWORDS)) return;

    const { company, position } = splitCompany(entry.title);
    run.offer({
      nativeId: lastPathSegment(entry.link) ?? contentHash(entry.guid ?? entry.link),
      title: position,
      description: entry.description,
      url: entry.link,
      type: "remote_job",
      valueText: entry.description,
      createdAt: entry.publishedAt,
      extras: { company, category: entry.categories[0] },
    });
  }
}
