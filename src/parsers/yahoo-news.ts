import { cssStrategy } from "../strategies.js";
import type { SiteProfile } from "../types.js";

export const YAHOO_NEWS_URL = "https://news.yahoo.com/";

/** Stream links also point at videos, sections and ads */
export function isYahooArticleUrl(url: URL): boolean {
  return url.pathname.includes("/news/") || url.pathname.includes("/articles/");
}

export const yahooNewsProfile: SiteProfile = {
  id: "yahoo",
  name: "Yahoo News",
  targetUrl: YAHOO_NEWS_URL,
  strategies: [
    cssStrategy({
      name: "stream-item",
      container: "li.stream-item",
      link: 'h3[data-test-locator="stream-item-title"] a',
      author: '[data-test-locator="stream-item-publisher"]',
      timeIndicator: '[data-test-locator="stream-read-time"]',
      acceptUrl: isYahooArticleUrl,
    }),
    // Layout served to some regions, same locators on a different container
    cssStrategy({
      name: "stream-content",
      container: ".js-stream-content",
      link: "h3 a",
      author: '[data-test-locator="stream-item-publisher"], .publisher',
      timeIndicator: '[data-test-locator="stream-read-time"], time',
      acceptUrl: isYahooArticleUrl,
    }),
    cssStrategy({
      name: "article-card",
      container: "article",
      link: "h2 a, h3 a",
      author: '[rel="author"], .author, .byline, .publisher',
      timeIndicator: "time",
      acceptUrl: isYahooArticleUrl,
    }),
  ],
};
