import { REDDIT_BASE_URL, RedditAdapter } from "../src/sources/reddit.js";
import { FakeHttp, jsonFixture, makeContext } from "./helpers.js";

const forhireUrl = `${REDDIT_BASE_URL}/r/forhire/new.json`;
const startupsUrl = `${REDDIT_BASE_URL}/r/startups/new.json`;

describe("Reddit source", () => {
  it("should keep hiring posts and drop self-promotion", async () => {
    const http = new FakeHttp().on(forhireUrl, jsonFixture("reddit-forhire.json"));
    const adapter = new RedditAdapter(makeContext(http), { subreddits: ["forhire", "startups"] });

    const results = await adapter.fetch({});

    expect(results).toEqual([
      {
        id: "reddit_r1",
        source: "reddit",
        nativeId: "r1",
        title: "[Hiring] React developer for dashboard",
        description: "Budget $2,000 - $3,000. DM me.",
        url: "https://reddit.com/r/forhire/comments/r1/hiring_react/",
        type: "help_request",
        estimatedValue: 2500,
        valueSource: "extracted",
        createdAt: "2026-03-10T00:00:00.000Z",
        extras: { subreddit: "forhire", author: "client1" },
      },
    ]);
  });

  it("should keep going when one subreddit fails", async () => {
    const http = new FakeHttp()
      .fail(startupsUrl, new TypeError("fetch failed"))
      .on(forhireUrl, jsonFixture("reddit-forhire.json"));
    const adapter = new RedditAdapter(makeContext(http), { subreddits: ["startups", "forhire"] });

    const results = await adapter.fetch({});

    expect(http.urls()).toEqual([startupsUrl, forhireUrl]);
    expect(results.map((opp) => opp.id)).toEqual(["reddit_r1"]);
  });

  it("should request the newest posts with a limit", async () => {
    const http = new FakeHttp().on(forhireUrl, { data: { children: [] } });
    const adapter = new RedditAdapter(makeContext(http), { subreddits: ["forhire"] });

    await adapter.fetch({});

    expect(http.requests[0].target).toBe("https://www.reddit.com/r/forhire/new.json?limit=25");
  });

  it("should widen the filter with profile keywords", async () => {
    const http = new FakeHttp().on(forhireUrl, jsonFixture("reddit-forhire.json"));
    const adapter = new RedditAdapter(makeContext(http), { subreddits: ["forhire"] });

    const results = await adapter.fetch({ keywords: ["editor"] });

    expect(results.map((opp) => opp.id)).toEqual(["reddit_r1", "reddit_r3"]);
    expect(results[1]).toMatchObject({ estimatedValue: 500, valueSource: "default", description: "" });
  });

  it("should cap the number of subreddits", async () => {
    const http = new FakeHttp();
    const subreddits = Array.from({ length: 12 }, (_, i) => `sub${i}`);
    const adapter = new RedditAdapter(makeContext(http), { subreddits });

    expect(await adapter.fetch({})).toEqual([]);
    expect(http.requests).toHaveLength(10);
  });
});
