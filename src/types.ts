export const SITE_IDS = ["yahoo", "hackernews"] as const;

export type SiteId = (typeof SITE_IDS)[number];

export interface NewsItem {
  readonly title: string;
  /** Absolute URL, resolved against the page the item was found on */
  readonly url: string;
  readonly author: string;
  /** Rendered as-is ("4 min read", "2 hours ago"), not a timestamp */
  readonly timeIndicator: string;
  /** Points shown next to the item on sites that rank by votes */
  readonly score?: number;
}

export interface FetchResult {
  markup: string;
  /** Effective URL after redirects */
  url: string;
  status: number;
}

/**
 * Describes how to find news items in one variant of a site's markup.
 * Field lookups receive the candidate container returned by `candidates`.
 */
export interface SelectorStrategy {
  name: string;
  candidates(document: Document): Element[];
  link(candidate: Element): Element | null;
  author?(candidate: Element): Element | null;
  timeIndicator?(candidate: Element): Element | null;
  score?(candidate: Element): number | undefined;
  /** Rejects resolved URLs that are not news items (ads, section links) */
  acceptUrl?(url: URL): boolean;
}

export interface SiteProfile {
  id: SiteId;
  name: string;
  targetUrl: string;
  /** Tried in order, the first one yielding items wins */
  strategies: SelectorStrategy[];
}

export interface NewsResult {
  site: SiteId;
  siteName: string;
  url: string;
  strategy: string;
  items: NewsItem[];
}
