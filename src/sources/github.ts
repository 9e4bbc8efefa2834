import { z } from "zod";
import { extractBudgetDetailed } from "../transform/budget.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import type { AdapterContext } from "./types.js";

export const GITHUB_SEARCH_URL = "https://api.github.com/search/issues";

const LABEL_QUERIES = ["label:bounty", 'label:"help wanted"', 'label:"good first issue" bounty'];

const KEYWORDS = ["bounty", "help wanted", "paid", "reward", "sponsor", "hiring", "freelance", "$"];
const BOUNTY_MARKERS = ["bounty", "reward", "paid"];

const PER_PAGE = 20;
const MAX_SKILL_QUERIES = 3;
const PAUSE_MS = 1000;

const GithubSearchResponse = z.object({
  items: z.array(z.unknown()),
});

const GithubIssue = z.object({
  id: z.number(),
  title: z.string(),
  body: z.string().nullish(),
  html_url: z.string(),
  created_at: z.string(),
  labels: z.array(z.object({ name: z.string() })).default([]),
  user: z.object({ login: z.string() }).nullish(),
});

type GithubIssue = z.infer<typeof GithubIssue>;

export interface GithubAdapterOptions {
  /** Personal access token; unauthenticated search has a much lower rate allowance. */
  token?: string;
}

/**
 * Amount advertised in a label such as "Bounty $250".
 */
export function bountyFromLabels(labels: readonly string[]): number | null {
  for (const label of labels) {
    if (!label.includes("$")) continue;
    const estimate = extractBudgetDetailed(label);
    if (estimate.pattern !== null) return estimate.value;
  }
  return null;
}

/**
 * Issue search over bounty and help-wanted labels, one query at a time.
 */
export class GithubAdapter extends SourceAdapter {
  readonly name = "github" as const;
  private readonly token?: string;

  constructor(context: AdapterContext, options: GithubAdapterOptions = {}) {
    super(context);
    this.token = options.token;
  }

  queries(skills: readonly string[] = []): string[] {
    const skillQueries = skills
      .slice(0, MAX_SKILL_QUERIES)
      .map((skill) => `${skill} label:"help wanted"`);
    return [...LABEL_QUERIES, ...skillQueries];
  }

  protected async collect(run: DiscoveryRun): Promise<void> {
    if (!this.token) {
      run.logger.debug("No GITHUB_TOKEN set; searching unauthenticated");
    }

    const keywords = run.keywords(KEYWORDS);
    const queries = this.queries(run.profile.skills);

    for (const [index, query] of queries.entries()) {
      if (index > 0) await run.pause(PAUSE_MS);

      const body = await run.fetchJson(`search ${query}`, GITHUB_SEARCH_URL, {
        query: { q: `${query} is:open is:issue`, sort: "created", order: "desc", per_page: PER_PAGE },
        accept: "application/vnd.github+json",
        bearerToken: this.token,
      });
      if (body === null) continue;

      const response = GithubSearchResponse.safeParse(body);
      if (!response.success) {
        run.logger.warn({ query }, "Unexpected search response shape");
        continue;
      }

      for (const item of response.data.items.slice(0, PER_PAGE)) {
        const issue = GithubIssue.safeParse(item);
        if (!issue.success) {
          run.logger.debug({ query }, "Skipping malformed issue");
          continue;
        }
        this.consider(run, issue.data, keywords);
      }
    }
  }

  private consider(run: DiscoveryRun, issue: GithubIssue, keywords: readonly string[]): void {
    const labels = issue.labels.map((label) => label.name);
    const body = issue.body ?? "";
    const text = `${issue.title} ${body} ${labels.join(" ")}`;

    if (!run.matches(text, keywords)) return;

    run.offer({
      nativeId: String(issue.id),
      title: issue.title,
      description: body,
      url: issue.html_url,
      type: run.matches(text, BOUNTY_MARKERS) ? "bounty" : "open_source_contribution",
      platformValue: bountyFromLabels(labels),
      valueText: `${issue.title} ${body}`,
      createdAt: issue.created_at,
      extras: { tags: labels, author: issue.user?.login },
    });
  }
}
