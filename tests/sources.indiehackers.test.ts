import { INDIE_HACKERS_FEED_URL, IndieHackersAdapter } from "../src/sources/indiehackers.js";
import { parseIndieHackersFeed } from "../src/sources/markup/indieHackers.js";
import { contentHash } from "../src/transform/normalize.js";
import { MarkupChangedError } from "../src/util/errors.js";
import { FakeHttp, NOW, fixture, makeContext } from "./helpers.js";

const baseUrl = "https://www.indiehackers.com";

describe("IndieHackers markup", () => {
  it("should extract titled listings with absolute links", () => {
    expect(parseIndieHackersFeed(fixture("indiehackers.html"), baseUrl)).toEqual([
      { title: "Looking for a technical co-founder", url: "https://www.indiehackers.com/post/looking-for-cofounder-123" },
      { title: "My MRR milestone", url: "https://www.indiehackers.com/post/mrr-456" },
      { title: "Need help with SEO", url: "https://www.indiehackers.com/post/seo-789" },
    ]);
  });

  it("should honour the listing limit", () => {
    expect(parseIndieHackersFeed(fixture("indiehackers.html"), baseUrl, 1)).toHaveLength(1);
  });

  it("should report changed markup", () => {
    expect(() => parseIndieHackersFeed("<html><body><p>Redesigned</p></body></html>", baseUrl)).toThrow(
      MarkupChangedError
    );
  });

  it("should treat an empty page as no listings", () => {
    expect(parseIndieHackersFeed("", baseUrl)).toEqual([]);
  });
});

describe("IndieHackers source", () => {
  it("should keep collaboration requests", async () => {
    const http = new FakeHttp().on(INDIE_HACKERS_FEED_URL, fixture("indiehackers.html"));
    const adapter = new IndieHackersAdapter(makeContext(http));

    const results = await adapter.fetch({});

    const url = "https://www.indiehackers.com/post/looking-for-cofounder-123";
    expect(results).toHaveLength(2);
    expect(results[0]).toEqual({
      id: `indiehackers_${contentHash(url)}`,
      source: "indiehackers",
      nativeId: contentHash(url),
      title: "Looking for a technical co-founder",
      description: "IndieHackers post: Looking for a technical co-founder",
      url,
      type: "collaboration",
      estimatedValue: 500,
      valueSource: "default",
      createdAt: NOW.toISOString(),
    });
    expect(results[1].title).toBe("Need help with SEO");
  });

  it("should resolve with nothing when the markup changed", async () => {
    const http = new FakeHttp().on(INDIE_HACKERS_FEED_URL, "<html><body><main>New layout</main></body></html>");
    const adapter = new IndieHackersAdapter(makeContext(http));

    await expect(adapter.fetch({})).resolves.toEqual([]);
  });
});
