import { describe, expect, it } from "vitest";

import { StructureMismatch } from "../../errors.js";
import { extractNewsWithStrategy } from "../../extract.js";
import { YAHOO_NEWS_URL, isYahooArticleUrl, yahooNewsProfile } from "../yahoo-news.js";

function page(body: string): string {
  return `<!DOCTYPE html><html lang="en"><head><title>Yahoo News</title></head><body>${body}</body></html>`;
}

function extract(body: string, limit = 20) {
  return extractNewsWithStrategy(page(body), YAHOO_NEWS_URL, limit, yahooNewsProfile.strategies);
}

const STREAM = `
<ul>
  <li class="stream-item js-stream-content">
    <div>
      <h3 data-test-locator="stream-item-title">
        <a href="/news/markets-rally-120000123.html">Markets rally on rate hopes</a>
      </h3>
      <div>
        <span data-test-locator="stream-item-publisher">Reuters</span>
        <span data-test-locator="stream-read-time">3 min read</span>
      </div>
    </div>
  </li>
  <li class="stream-item">
    <h3 data-test-locator="stream-item-title"><a href="https://www.yahoo.com/lifestyle/recipes-1.html">Ten recipes</a></h3>
  </li>
  <li class="stream-item">
    <h3 data-test-locator="stream-item-title"><a href="https://finance.yahoo.com/articles/chip-makers-2.html">Chip makers</a></h3>
  </li>
</ul>`;

describe("yahooNewsProfile", () => {
  it("targets the Yahoo News homepage", () => {
    expect(yahooNewsProfile.targetUrl).toBe("https://news.yahoo.com/");
    expect(yahooNewsProfile.strategies.map((strategy) => strategy.name)).toEqual([
      "stream-item",
      "stream-content",
      "article-card",
    ]);
  });

  it("extracts stream items and skips non-article links", () => {
    const result = extract(STREAM);

    expect(result.strategy).toBe("stream-item");
    expect(result.items).toEqual([
      {
        title: "Markets rally on rate hopes",
        url: "https://news.yahoo.com/news/markets-rally-120000123.html",
        author: "Reuters",
        timeIndicator: "3 min read",
      },
      {
        title: "Chip makers",
        url: "https://finance.yahoo.com/articles/chip-makers-2.html",
        author: "Unknown",
        timeIndicator: "",
      },
    ]);
  });

  it("falls back to stream content blocks", () => {
    const result = extract(`
      <div class="js-stream-content">
        <h3><a href="/news/storm-warning-1.html">Storm warning issued</a></h3>
        <div class="publisher">Associated Press</div>
      </div>`);

    expect(result.strategy).toBe("stream-content");
    expect(result.items).toEqual([
      {
        title: "Storm warning issued",
        url: "https://news.yahoo.com/news/storm-warning-1.html",
        author: "Associated Press",
        timeIndicator: "",
      },
    ]);
  });

  it("falls back to article cards", () => {
    const result = extract(`
      <main>
        <article>
          <h2><a href="/articles/election-night-3.html">Election night recap</a></h2>
          <span class="byline">The Daily Example</span>
          <time datetime="2026-10-19T08:00:00Z">2 hours ago</time>
        </article>
      </main>`);

    expect(result.strategy).toBe("article-card");
    expect(result.items).toEqual([
      {
        title: "Election night recap",
        url: "https://news.yahoo.com/articles/election-night-3.html",
        author: "The Daily Example",
        timeIndicator: "2 hours ago",
      },
    ]);
  });

  it("reports a structure mismatch for a page that needs JavaScript", () => {
    expect(() => extract('<div id="app"></div><noscript>Enable JavaScript</noscript>')).toThrow(
      StructureMismatch
    );
  });
});

describe("isYahooArticleUrl", () => {
  it("accepts news and article paths only", () => {
    expect(isYahooArticleUrl(new URL("https://news.yahoo.com/news/a.html"))).toBe(true);
    expect(isYahooArticleUrl(new URL("https://www.yahoo.com/articles/b.html"))).toBe(true);
    expect(isYahooArticleUrl(new URL("https://www.yahoo.com/video/c.html"))).toBe(false);
  });
});
