import { fetch } from "undici";
import type { Logger } from "../util/logger.js";
import { HttpError, ResponseParseError } from "../util/errors.js";

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  /** Sent as `Authorization: Bearer <token>` when present. */
  bearerToken?: string;
  accept?: string;
  signal?: AbortSignal;
}

/**
 * The slice of HTTP that source adapters depend on.
 */
export interface HttpFetcher {
  getJson(url: string, options?: RequestOptions): Promise<unknown>;
  getText(url: string, options?: RequestOptions): Promise<string>;
}

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  logger: Logger;
}

export function buildUrl(url: string, query?: Record<string, QueryValue>): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

/**
 * GET-only client over undici's fetch. Every call carries its own timeout,
 * combined with the caller's abort signal. No retries: a failed call is
 * reported once and the caller decides what to skip.
 */
export class HttpClient implements HttpFetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const { text, target } = await this.request(url, {
      ...options,
      accept: options.accept ?? "application/json",
    });

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      this.logger.debug({ url: target, textPreview: text.substring(0, 200) }, "Non-JSON response");
      throw new ResponseParseError(target, error);
    }
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const { text } = await this.request(url, {
      ...options,
      accept: options.accept ?? "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    });
    return text;
  }

  private async request(
    url: string,
    options: RequestOptions
  ): Promise<{ text: string; target: string }> {
    const target = buildUrl(url, options.query);

    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      ...(options.accept ? { Accept: options.accept } : {}),
      ...options.headers,
    };
    if (options.bearerToken) {
      headers.Authorization = `Bearer ${options.bearerToken}`;
    }

    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (options.signal) signals.push(options.signal);

    this.logger.debug({ url: target, authenticated: Boolean(options.bearerToken) }, "GET");

    const res = await fetch(target, { headers, signal: AbortSignal.any(signals) });

    if (!res.ok) {
      await res.body?.cancel();
      throw new HttpError(res.status, res.statusText, target);
    }

    return { text: await res.text(), target };
  }
}
