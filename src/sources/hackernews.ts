import { z } from "zod";
import { htmlToText } from "../transform/text.js";
import { fromEpochSeconds } from "../util/time.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";

export const HN_API_URL = "https://hacker-news.firebaseio.com/v0";

const STORY_LISTS = ["jobstories", "askstories"] as const;

const KEYWORDS = [
  "hiring",
  "freelance",
  "looking for",
  "seeking",
  "contract",
  "cofounder",
  "co-founder",
];

const ITEMS_PER_LIST = 30;
const PAUSE_MS = 100;

const StoryIds = z.array(z.number());

const HnItem = z.object({
  id: z.number(),
  type: z.string(),
  title: z.string().optional(),
  text: z.string().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

type HnItem = z.infer<typeof HnItem>;

function classify(item: HnItem, title: string): string {
  if (item.type === "job") return "job_posting";
  if (title.startsWith("Show HN")) return "show_hn";
  return "ask_hn";
}

/**
 * Firebase tree API: one ID list per story feed, then one request per item.
 * IDs already surfaced within the TTL are not fetched again.
 */
export class HackerNewsAdapter extends SourceAdapter {
  readonly name = "hackernews" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const keywords = run.keywords(KEYWORDS);

    for (const list of STORY_LISTS) {
      const body = await run.fetchJson(list, `${HN_API_URL}/${list}.json`);
      if (body === null) continue;

      const ids = StoryIds.safeParse(body);
      if (!ids.success) {
        run.logger.warn({ list }, "Unexpected story list shape");
        continue;
      }

      for (const id of ids.data.slice(0, ITEMS_PER_LIST)) {
        const nativeId = String(id);
        if (run.seen(nativeId)) continue;

        await run.pause(PAUSE_MS);
        const raw = await run.fetchJson(`item ${id}`, `${HN_API_URL}/item/${id}.json`);
        if (raw === null) continue;

        const item = HnItem.safeParse(raw);
        if (!item.success || item.data.deleted || item.data.dead || !item.data.title) continue;

        const title = item.data.title;
        const text = htmlToText(item.data.text);
        if (item.data.type !== "job" && !run.matches(`${title} ${text}`, keywords)) continue;

        run.offer({
          nativeId,
          title,
          description: text,
          url: `https://news.ycombinator.com/item?id=${id}`,
          type: classify(item.data, title),
          valueText: `${title} ${text}`,
          createdAt: fromEpochSeconds(item.data.time),
          extras: { author: item.data.by },
        });
      }
    }
  }
}
