import { parseLeadingInt } from "../strategies.js";
import type { SelectorStrategy, SiteProfile } from "../types.js";

export const HACKER_NEWS_URL = "https://news.ycombinator.com/";

// Author, age and score live in the row right after the title row
function subtextOf(row: Element): Element | null {
  return row.nextElementSibling?.querySelector(".subtext") ?? null;
}

const subtextFields = {
  author: (row: Element) => subtextOf(row)?.querySelector("a.hnuser") ?? null,
  timeIndicator: (row: Element) => subtextOf(row)?.querySelector("span.age") ?? null,
  score: (row: Element) => parseLeadingInt(subtextOf(row)?.querySelector("span.score")?.textContent),
};

const athingRows: SelectorStrategy = {
  name: "athing-row",
  candidates: (document) => Array.from(document.querySelectorAll("tr.athing")),
  link: (row) => row.querySelector("span.titleline > a"),
  ...subtextFields,
};

/** Survives the story rows losing their `athing` class */
const titlelineRows: SelectorStrategy = {
  name: "titleline",
  candidates: (document) =>
    Array.from(document.querySelectorAll("span.titleline")).map(
      (titleline) => titleline.closest("tr") ?? titleline
    ),
  link: (row) => row.querySelector("span.titleline > a") ?? row.querySelector(":scope > a"),
  ...subtextFields,
};

export const hackerNewsProfile: SiteProfile = {
  id: "hackernews",
  name: "Hacker News",
  targetUrl: HACKER_NEWS_URL,
  strategies: [athingRows, titlelineRows],
};
