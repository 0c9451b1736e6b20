import type { NewsConfig } from "./config.js";
import { extractNewsWithStrategy } from "./extract.js";
import { fetchHomepage, type Transport } from "./fetch.js";
import type { Logger } from "./logger.js";
import { getSiteProfile, listSiteProfiles } from "./parsers/index.js";
import type { NewsResult } from "./types.js";

export interface NewsContext {
  config: NewsConfig;
  logger: Logger;
  transport?: Transport;
}

export interface FetchNewsOptions {
  limit?: number;
  timeoutMs?: number;
}

export async function fetchNews(
  siteId: string,
  context: NewsContext,
  options: FetchNewsOptions = {}
): Promise<NewsResult> {
  const profile = getSiteProfile(siteId);
  if (!profile) {
    const known = listSiteProfiles().map((p) => p.id).join(", ");
    throw new RangeError(`Unknown news site "${siteId}", expected one of: ${known}`);
  }

  const { config, logger } = context;
  const limit = options.limit ?? config.limit;
  const startedAt = Date.now();

  const page = await fetchHomepage({
    url: profile.targetUrl,
    timeoutMs: options.timeoutMs ?? config.timeoutMs,
    verifyCertificates: config.verifyCertificates,
    userAgent: config.userAgent,
    transport: context.transport,
    logger,
  });

  const { strategy, items } = extractNewsWithStrategy(page.markup, page.url, limit, profile.strategies, {
    defaultAuthor: config.defaultAuthor,
    logger,
  });

  logger.info("Extracted news items", {
    site: profile.id,
    strategy,
    count: items.length,
    limit,
    durationMs: Date.now() - startedAt,
  });

  return {
    site: profile.id,
    siteName: profile.name,
    url: page.url,
    strategy,
    items,
  };
}
