import type { SiteProfile } from "../types.js";
import { hackerNewsProfile } from "./hacker-news.js";
import { yahooNewsProfile } from "./yahoo-news.js";

const SITE_REGISTRY = new Map<string, SiteProfile>();

function registerSite(profile: SiteProfile): void {
  SITE_REGISTRY.set(profile.id, profile);
}

registerSite(yahooNewsProfile);
registerSite(hackerNewsProfile);

export { hackerNewsProfile, yahooNewsProfile };
export { formatNewsResult, formatNewsToMarkdown, sortByScore } from "./markdown.js";
export type { OutputFormat } from "./markdown.js";

/** Accepts ids case-insensitively */
export function getSiteProfile(siteId: string): SiteProfile | undefined {
  return SITE_REGISTRY.get(siteId.trim().toLowerCase());
}

export function listSiteProfiles(): SiteProfile[] {
  return [...SITE_REGISTRY.values()];
}
