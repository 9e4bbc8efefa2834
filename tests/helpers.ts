import { readFileSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import { TtlDedupCache } from "../src/cache/dedupCache.js";
import { HttpError } from "../src/util/errors.js";
import { buildUrl, type HttpFetcher, type RequestOptions } from "../src/client/http.js";
import type { SourceSettings } from "../src/config.js";
import type { AdapterContext } from "../src/sources/types.js";
import type { Logger } from "../src/util/logger.js";

export const NOW = new Date("2026-03-10T12:00:00.000Z");

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function fixture(name: string): string {
  return readFileSync(join(__dirname, "fixtures", name), "utf-8");
}

export function jsonFixture(name: string): unknown {
  const parsed: unknown = JSON.parse(fixture(name));
  return parsed;
}

export interface RecordedRequest {
  kind: "json" | "text";
  url: string;
  /** URL with the query string applied. */
  target: string;
  options: RequestOptions;
}

type Responder = (request: RecordedRequest) => unknown;

/**
 * In-process stand-in for the undici client. Routes are keyed by URL
 * without query; an unrouted URL answers 404.
 */
export class FakeHttp implements HttpFetcher {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Responder>();

  on(url: string, response: unknown): this {
    this.routes.set(url, () => response);
    return this;
  }

  onRequest(url: string, responder: Responder): this {
    this.routes.set(url, responder);
    return this;
  }

  fail(url: string, error: Error): this {
    this.routes.set(url, () => {
      throw error;
    });
    return this;
  }

  urls(): string[] {
    return this.requests.map((request) => request.url);
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.respond({ kind: "json", url, target: buildUrl(url, options.query), options });
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const body = this.respond({ kind: "text", url, target: buildUrl(url, options.query), options });
    if (typeof body !== "string") {
      throw new Error(`Route ${url} answered with a non-string body`);
    }
    return body;
  }

  private respond(request: RecordedRequest): unknown {
    this.requests.push(request);
    const responder = this.routes.get(request.url);
    if (!responder) {
      throw new HttpError(404, "Not Found", request.target);
    }
    return responder(request);
  }
}

export const OPEN_SETTINGS: SourceSettings = { enabled: true, rateLimitPerHour: 60, minValue: 0 };

export function makeContext(http: HttpFetcher, overrides: Partial<AdapterContext> = {}): AdapterContext {
  return {
    http,
    cache: new TtlDedupCache({ now: () => NOW.getTime() }),
    logger: silentLogger(),
    settings: OPEN_SETTINGS,
    now: () => NOW,
    pauseMs: 0,
    ...overrides,
  };
}
