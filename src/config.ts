import { config } from "dotenv";
import { SOURCE_NAMES, isSourceName, type SourceName } from "./transform/schema.js";
import { ConfigError } from "./util/errors.js";

// Load .env from the working directory
config();

export interface SourceSettings {
  enabled: boolean;
  /** Advisory only: logged with each run, not enforced. */
  rateLimitPerHour: number;
  minValue: number;
}

export interface AppConfig {
  userAgent: string;
  requestTimeoutMs: number;
  adapterDeadlineMs: number;
  batchDeadlineMs: number;
  cacheTtlHours: number;
  cacheMaxEntries: number;
  statePath: string;
  githubToken?: string;
  stackExchangeKey?: string;
  sources: Record<SourceName, SourceSettings>;
}

export const DEFAULT_SOURCE_SETTINGS: Readonly<Record<SourceName, Readonly<SourceSettings>>> = {
  github: { enabled: true, rateLimitPerHour: 60, minValue: 0 },
  reddit: { enabled: true, rateLimitPerHour: 100, minValue: 0 },
  hackernews: { enabled: true, rateLimitPerHour: 60, minValue: 0 },
  remoteok: { enabled: true, rateLimitPerHour: 30, minValue: 0 },
  remotive: { enabled: true, rateLimitPerHour: 30, minValue: 0 },
  weworkremotely: { enabled: true, rateLimitPerHour: 30, minValue: 0 },
  upwork: { enabled: true, rateLimitPerHour: 60, minValue: 100 },
  stackoverflow: { enabled: true, rateLimitPerHour: 30, minValue: 50 },
  producthunt: { enabled: true, rateLimitPerHour: 30, minValue: 0 },
  indiehackers: { enabled: true, rateLimitPerHour: 20, minValue: 0 },
  linkedin: { enabled: true, rateLimitPerHour: 30, minValue: 0 },
  // Requires API credentials this engine does not manage
  twitter: { enabled: false, rateLimitPerHour: 100, minValue: 0 },
};

function mapSources<T>(build: (name: SourceName) => T): Record<SourceName, T> {
  return {
    github: build("github"),
    reddit: build("reddit"),
    hackernews: build("hackernews"),
    remoteok: build("remoteok"),
    remotive: build("remotive"),
    weworkremotely: build("weworkremotely"),
    upwork: build("upwork"),
    stackoverflow: build("stackoverflow"),
    producthunt: build("producthunt"),
    indiehackers: build("indiehackers"),
    linkedin: build("linkedin"),
    twitter: build("twitter"),
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid ${name}: ${raw} (expected an integer >= ${min})`);
  }
  return value;
}

function readSourceList(env: NodeJS.ProcessEnv, name: string): SourceName[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  const names = raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);

  const unknown = names.filter((n) => !isSourceName(n));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown source(s) in ${name}: ${unknown.join(", ")}. Known sources: ${SOURCE_NAMES.join(", ")}`
    );
  }
  return names.filter(isSourceName);
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load and validate configuration from environment variables.
 * Fails fast on malformed values; credentials are optional.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const enabledList = readSourceList(env, "DISCOVERY_ENABLED_SOURCES");
  const disabledList = readSourceList(env, "DISCOVERY_DISABLED_SOURCES") ?? [];

  const sources = mapSources((name): SourceSettings => {
    const defaults = DEFAULT_SOURCE_SETTINGS[name];
    const enabled =
      (enabledList ? enabledList.includes(name) : defaults.enabled) && !disabledList.includes(name);
    return {
      enabled,
      rateLimitPerHour: defaults.rateLimitPerHour,
      minValue: readInt(env, `${name.toUpperCase()}_MIN_VALUE`, defaults.minValue, 0),
    };
  });

  const adapterDeadlineMs = readInt(env, "DISCOVERY_ADAPTER_DEADLINE_MS", 60_000, 1);
  const batchDeadlineMs = readInt(env, "DISCOVERY_BATCH_DEADLINE_MS", 120_000, 1);

  return {
    userAgent: readOptional(env, "DISCOVERY_USER_AGENT") ?? "opportunity-discovery/1.0",
    requestTimeoutMs: readInt(env, "DISCOVERY_REQUEST_TIMEOUT_MS", 10_000, 1),
    adapterDeadlineMs,
    batchDeadlineMs,
    cacheTtlHours: readInt(env, "DISCOVERY_CACHE_TTL_HOURS", 24, 1),
    cacheMaxEntries: readInt(env, "DISCOVERY_CACHE_MAX_ENTRIES", 50_000, 1),
    statePath: readOptional(env, "DISCOVERY_STATE_PATH") ?? "state/seen.json",
    githubToken: readOptional(env, "GITHUB_TOKEN"),
    stackExchangeKey: readOptional(env, "STACKEXCHANGE_KEY"),
    sources,
  };
}

export function enabledSources(config: AppConfig): SourceName[] {
  return SOURCE_NAMES.filter((name) => config.sources[name].enabled);
}
