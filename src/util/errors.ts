import { ZodError } from "zod";

export type ErrorKind = "timeout" | "network" | "http" | "parse" | "markup" | "unknown";

/**
 * Non-2xx response from an upstream platform.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpError";
  }
}

/**
 * Body could not be decoded as the format we asked for.
 */
export class ResponseParseError extends Error {
  constructor(
    readonly url: string,
    cause: unknown
  ) {
    super(`Failed to parse response from ${url}: ${errorMessage(cause)}`);
    this.name = "ResponseParseError";
  }
}

/**
 * A scraped page no longer contains the structure its parser expects.
 */
export class MarkupChangedError extends Error {
  constructor(
    readonly source: string,
    readonly selector: string
  ) {
    super(`No elements matched "${selector}" on ${source} page; markup may have changed`);
    this.name = "MarkupChangedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised through abort signals when an adapter or a whole batch runs out of time.
 */
export class DeadlineError extends Error {
  constructor(
    readonly scope: "adapter" | "batch",
    readonly deadlineMs: number
  ) {
    super(`${scope === "batch" ? "Batch" : "Adapter"} deadline of ${deadlineMs}ms exceeded`);
    this.name = "DeadlineError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorName(error: unknown): string {
  if (error && typeof error === "object" && "name" in error && typeof error.name === "string") {
    return error.name;
  }
  return "";
}

const NETWORK_MARKERS = [
  "fetch failed",
  "network",
  "connection",
  "econnrefused",
  "econnreset",
  "enotfound",
  "eai_again",
  "socket hang up",
];

/**
 * Bucket a failure for logs and per-source diagnostics.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof HttpError) return "http";
  if (error instanceof MarkupChangedError) return "markup";
  if (error instanceof ResponseParseError || error instanceof ZodError) return "parse";
  if (error instanceof DeadlineError) return "timeout";

  const name = errorName(error);
  if (name === "TimeoutError" || name === "AbortError") return "timeout";
  if (name === "SyntaxError") return "parse";

  const cause =
    error instanceof Error && error.cause !== undefined ? ` ${errorMessage(error.cause)}` : "";
  const text = `${errorMessage(error)}${cause}`.toLowerCase();

  if (text.includes("timeout") || text.includes("timed out")) return "timeout";
  if (NETWORK_MARKERS.some((marker) => text.includes(marker))) return "network";

  return "unknown";
}
