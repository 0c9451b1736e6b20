import { describe, expect, it } from "vitest";

import type { NewsItem, NewsResult } from "../../types.js";
import { formatNewsResult, formatNewsToMarkdown, sortByScore } from "../markdown.js";

const reuters: NewsItem = {
  title: "Markets rally",
  url: "https://news.example.test/news/markets",
  author: "Reuters",
  timeIndicator: "3 min read",
};

const scored: NewsItem = {
  title: "Show HN: A tiny parser",
  url: "https://example.org/post",
  author: "alice",
  timeIndicator: "",
  score: 5,
};

function result(items: NewsItem[]): NewsResult {
  return {
    site: "yahoo",
    siteName: "Yahoo News",
    url: "https://news.yahoo.com/",
    strategy: "stream-item",
    items,
  };
}

describe("formatNewsToMarkdown", () => {
  it("renders a numbered list with author, time and score", () => {
    expect(formatNewsToMarkdown([reuters, scored])).toBe(
      "1. **[Markets rally](https://news.example.test/news/markets)**\n" +
        "   Reuters | 3 min read\n\n" +
        "2. **[Show HN: A tiny parser](https://example.org/post)**\n" +
        "   alice | 5 points"
    );
  });

  it("returns an empty string for no items", () => {
    expect(formatNewsToMarkdown([])).toBe("");
  });
});

describe("formatNewsResult", () => {
  it("adds a heading with the site name and item count", () => {
    expect(formatNewsResult(result([reuters]), "markdown")).toBe(
      "## Yahoo News (1 item)\n\nSource: https://news.yahoo.com/\n\n" +
        "1. **[Markets rally](https://news.example.test/news/markets)**\n   Reuters | 3 min read"
    );
  });

  it("serializes the items as JSON", () => {
    const output = formatNewsResult(result([reuters, scored]), "json");

    expect(JSON.parse(output)).toEqual([reuters, scored]);
  });
});

describe("sortByScore", () => {
  it("puts the highest score first and unscored items last without mutating the input", () => {
    const items: NewsItem[] = [
      { ...scored, url: "https://example.org/12", score: 12 },
      reuters,
      { ...scored, url: "https://example.org/128", score: 128 },
    ];

    expect(sortByScore(items).map((item) => item.score)).toEqual([128, 12, undefined]);
    expect(items.map((item) => item.score)).toEqual([12, undefined, 128]);
  });
});
