import type { DedupCache } from "../cache/dedupCache.js";
import type { HttpFetcher } from "../client/http.js";
import type { AppConfig } from "../config.js";
import type { SourceName } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { GithubAdapter } from "./github.js";
import { HackerNewsAdapter } from "./hackernews.js";
import { IndieHackersAdapter } from "./indiehackers.js";
import { ProductHuntAdapter } from "./producthunt.js";
import { RedditAdapter } from "./reddit.js";
import { RemoteOkAdapter } from "./remoteok.js";
import { RemotiveAdapter } from "./remotive.js";
import { StackOverflowAdapter } from "./stackoverflow.js";
import { linkedInSource, twitterSource } from "./stubs.js";
import type { AdapterContext, OpportunitySource } from "./types.js";
import { UpworkAdapter } from "./upwork.js";
import { WeWorkRemotelyAdapter } from "./weworkremotely.js";

export interface SourceFactoryOptions {
  config: AppConfig;
  http: HttpFetcher;
  cache: DedupCache;
  logger: Logger;
  now?: () => Date;
}

/**
 * Every adapter, in registration order.
 */
export function createSources(options: SourceFactoryOptions): OpportunitySource[] {
  const { config, http, cache, logger, now } = options;
  const context = (name: SourceName): AdapterContext => ({
    http,
    cache,
    logger,
    now,
    settings: config.sources[name],
  });

  return [
    new GithubAdapter(context("github"), { token: config.githubToken }),
    new RedditAdapter(context("reddit")),
    new HackerNewsAdapter(context("hackernews")),
    new RemoteOkAdapter(context("remoteok")),
    new RemotiveAdapter(context("remotive")),
    new WeWorkRemotelyAdapter(context("weworkremotely")),
    new UpworkAdapter(context("upwork")),
    new StackOverflowAdapter(context("stackoverflow"), { key: config.stackExchangeKey }),
    new ProductHuntAdapter(context("producthunt")),
    new IndieHackersAdapter(context("indiehackers")),
    linkedInSource(context("linkedin")),
    twitterSource(context("twitter")),
  ];
}

export { SourceAdapter, DiscoveryRun } from "./base.js";
export type { AdapterContext, DiscoveryProfile, FetchOptions, OpportunitySource } from "./types.js";
