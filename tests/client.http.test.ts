import { Response, fetch } from "undici";
import { jest } from "@jest/globals";
import { HttpClient, buildUrl } from "../src/client/http.js";
import { HttpError, ResponseParseError } from "../src/util/errors.js";
import { silentLogger } from "./helpers.js";

jest.mock("undici", () => ({
  ...jest.requireActual<typeof import("undici")>("undici"),
  fetch: jest.fn(),
}));

const fetchMock = jest.mocked(fetch);

function client(): HttpClient {
  return new HttpClient({ userAgent: "test-agent/1.0", timeoutMs: 1000, logger: silentLogger() });
}

describe("HTTP client", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("should send identification and credentials", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"items":[1]}', { status: 200 }));

    const body = await client().getJson("https://api.example.com/search", {
      query: { q: "bounty", page: 2, skip: undefined },
      bearerToken: "test-secret",
    });

    expect(body).toEqual({ items: [1] });
    const [target, init] = fetchMock.mock.calls[0];
    expect(target).toBe("https://api.example.com/search?q=bounty&page=2");
    expect(init?.headers).toEqual({
      "User-Agent": "test-agent/1.0",
      Accept: "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should raise HttpError on non-2xx responses", async () => {
    fetchMock.mockResolvedValueOnce(new Response("down", { status: 503, statusText: "Service Unavailable" }));

    const request = client().getJson("https://api.example.com/search");

    await expect(request).rejects.toBeInstanceOf(HttpError);
    await expect(request).rejects.toMatchObject({
      status: 503,
      message: "HTTP 503: Service Unavailable",
      url: "https://api.example.com/search",
    });
  });

  it("should raise ResponseParseError on invalid JSON", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>blocked</html>", { status: 200 }));

    await expect(client().getJson("https://api.example.com/search")).rejects.toBeInstanceOf(ResponseParseError);
  });

  it("should return raw text for feeds and pages", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<rss></rss>", { status: 200 }));

    const text = await client().getText("https://example.com/feed.rss", { accept: "application/rss+xml" });

    expect(text).toBe("<rss></rss>");
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "User-Agent": "test-agent/1.0",
      Accept: "application/rss+xml",
    });
  });

  it("should build query strings", () => {
    expect(buildUrl("https://example.com/a", { q: "a b", n: 1, flag: false })).toBe(
      "https://example.com/a?q=a+b&n=1&flag=false"
    );
    expect(buildUrl("https://example.com/a")).toBe("https://example.com/a");
  });
});
