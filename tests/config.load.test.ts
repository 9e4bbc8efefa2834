import { ConfigError } from "../src/util/errors.js";
import { enabledSources, loadConfig } from "../src/config.js";

describe("Configuration", () => {
  it("should apply defaults", () => {
    const config = loadConfig({});

    expect(config.userAgent).toBe("opportunity-discovery/1.0");
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.adapterDeadlineMs).toBe(60000);
    expect(config.batchDeadlineMs).toBe(120000);
    expect(config.cacheTtlHours).toBe(24);
    expect(config.statePath).toBe("state/seen.json");
    expect(config.githubToken).toBeUndefined();
    expect(config.sources.upwork.minValue).toBe(100);
    expect(config.sources.stackoverflow.minValue).toBe(50);
    expect(enabledSources(config)).not.toContain("twitter");
    expect(enabledSources(config)).toHaveLength(11);
  });

  it("should replace the enabled set", () => {
    const config = loadConfig({ DISCOVERY_ENABLED_SOURCES: "reddit, GitHub" });
    expect(enabledSources(config)).toEqual(["github", "reddit"]);
  });

  it("should remove disabled sources", () => {
    const config = loadConfig({ DISCOVERY_DISABLED_SOURCES: "reddit,linkedin" });
    expect(config.sources.reddit.enabled).toBe(false);
    expect(enabledSources(config)).toHaveLength(9);
  });

  it("should read per-source minimums and credentials", () => {
    const config = loadConfig({ REDDIT_MIN_VALUE: "250", GITHUB_TOKEN: "test-secret", STACKEXCHANGE_KEY: "  " });
    expect(config.sources.reddit.minValue).toBe(250);
    expect(config.githubToken).toBe("test-secret");
    expect(config.stackExchangeKey).toBeUndefined();
  });

  it("should fail fast on malformed numbers", () => {
    expect(() => loadConfig({ DISCOVERY_REQUEST_TIMEOUT_MS: "abc" })).toThrow(
      new ConfigError("Invalid DISCOVERY_REQUEST_TIMEOUT_MS: abc (expected an integer >= 1)")
    );
    expect(() => loadConfig({ UPWORK_MIN_VALUE: "-1" })).toThrow(ConfigError);
  });

  it("should reject unknown source names", () => {
    expect(() => loadConfig({ DISCOVERY_ENABLED_SOURCES: "github,myspace" })).toThrow(ConfigError);
  });
});
