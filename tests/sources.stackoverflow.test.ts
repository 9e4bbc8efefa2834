import { STACK_EXCHANGE_FEATURED_URL, StackOverflowAdapter } from "../src/sources/stackoverflow.js";
import { FakeHttp, OPEN_SETTINGS, jsonFixture, makeContext } from "./helpers.js";

describe("Stack Overflow source", () => {
  it("should keep bountied questions above the minimum", async () => {
    const http = new FakeHttp().on(STACK_EXCHANGE_FEATURED_URL, jsonFixture("stackoverflow-featured.json"));
    const adapter = new StackOverflowAdapter(makeContext(http, { settings: { ...OPEN_SETTINGS, minValue: 50 } }));

    const results = await adapter.fetch({});

    expect(results).toEqual([
      {
        id: "stackoverflow_7001",
        source: "stackoverflow",
        nativeId: "7001",
        title: "How to stream large files with Node & undici?",
        description: "Open bounty of 100 reputation. Tags: node.js, undici",
        url: "https://stackoverflow.com/questions/7001/stream-large-files",
        type: "bounty",
        estimatedValue: 100,
        valueSource: "platform",
        createdAt: "2026-03-10T00:00:00.000Z",
        extras: { author: "asker", tags: ["node.js", "undici"] },
      },
    ]);
  });

  it("should never surface questions without a bounty", async () => {
    const http = new FakeHttp().on(STACK_EXCHANGE_FEATURED_URL, jsonFixture("stackoverflow-featured.json"));
    const adapter = new StackOverflowAdapter(makeContext(http));

    const results = await adapter.fetch({});

    expect(results.map((opp) => opp.nativeId)).toEqual(["7001", "7002"]);
  });

  it("should pass tags and the app key", async () => {
    const http = new FakeHttp().on(STACK_EXCHANGE_FEATURED_URL, { items: [] });
    const adapter = new StackOverflowAdapter(makeContext(http), { key: "test-secret" });

    await adapter.fetch({ skills: ["node.js", "undici"] });

    expect(http.requests[0].options.query).toEqual({
      order: "desc",
      sort: "activity",
      site: "stackoverflow",
      pagesize: 30,
      tagged: "node.js;undici",
      key: "test-secret",
    });
  });
});
