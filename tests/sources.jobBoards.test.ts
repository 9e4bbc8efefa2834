import { REMOTEOK_API_URL, RemoteOkAdapter, salaryValue } from "../src/sources/remoteok.js";
import { REMOTIVE_API_URL, RemotiveAdapter } from "../src/sources/remotive.js";
import { FakeHttp, jsonFixture, makeContext } from "./helpers.js";

describe("RemoteOK source", () => {
  it("should skip the legal notice and map jobs", async () => {
    const http = new FakeHttp().on(REMOTEOK_API_URL, jsonFixture("remoteok.json"));
    const adapter = new RemoteOkAdapter(makeContext(http));

    const results = await adapter.fetch({});

    expect(results).toHaveLength(2);
    expect(results[0]).toEqual({
      id: "remoteok_90001",
      source: "remoteok",
      nativeId: "90001",
      title: "Senior TypeScript Engineer at Acme",
      description: "Build APIs",
      url: "https://remoteok.com/remote-jobs/90001",
      type: "remote_job",
      estimatedValue: 120000,
      valueSource: "platform",
      createdAt: "2026-03-08T09:00:00.000Z",
      extras: { company: "Acme", location: "Worldwide", tags: ["typescript", "node"] },
    });
    expect(results[1]).toMatchObject({
      id: "remoteok_90002",
      url: "https://remoteok.com/remote-jobs/product-designer-beta-90002",
      estimatedValue: 500,
      valueSource: "default",
    });
  });

  it("should filter by profile skills", async () => {
    const http = new FakeHttp().on(REMOTEOK_API_URL, jsonFixture("remoteok.json"));
    const adapter = new RemoteOkAdapter(makeContext(http));

    const results = await adapter.fetch({ skills: ["typescript"] });

    expect(results.map((opp) => opp.id)).toEqual(["remoteok_90001"]);
  });

  it("should yield nothing for an unexpected body", async () => {
    const http = new FakeHttp().on(REMOTEOK_API_URL, { error: "rate limited" });
    const adapter = new RemoteOkAdapter(makeContext(http));

    expect(await adapter.fetch({})).toEqual([]);
  });

  it("should compute salary midpoints", () => {
    expect(salaryValue(100000, 140000)).toBe(120000);
    expect(salaryValue("50,000", "70,001")).toBe(60000);
    expect(salaryValue(null, "90000")).toBe(90000);
    expect(salaryValue(0, 0)).toBeNull();
  });
});

describe("Remotive source", () => {
  it("should map jobs and classify contract work as gigs", async () => {
    const http = new FakeHttp().on(REMOTIVE_API_URL, jsonFixture("remotive.json"));
    const adapter = new RemotiveAdapter(makeContext(http));

    const results = await adapter.fetch({});

    expect(results[0]).toEqual({
      id: "remotive_501",
      source: "remotive",
      nativeId: "501",
      title: "Backend Engineer",
      description: "Go and Postgres",
      url: "https://remotive.com/remote-jobs/software-dev/backend-engineer-501",
      type: "remote_job",
      estimatedValue: 90000,
      valueSource: "extracted",
      createdAt: "2026-03-09T08:00:00.000Z",
      extras: { company: "Gamma", category: "Software Development", location: "Europe" },
    });
    expect(results[1]).toMatchObject({
      id: "remotive_502",
      type: "freelance_gig",
      estimatedValue: 500,
      valueSource: "default",
    });
  });

  it("should search on the profile skills", async () => {
    const http = new FakeHttp().on(REMOTIVE_API_URL, { jobs: [] });
    const adapter = new RemotiveAdapter(makeContext(http));

    await adapter.fetch({ skills: ["go", "postgres"] });

    expect(http.requests[0].target).toBe("https://remotive.com/api/remote-jobs?limit=50&search=go+postgres");
  });
});
