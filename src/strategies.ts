import type { SelectorStrategy } from "./types.js";

export interface CssStrategyOptions {
  name: string;
  /** One match per news item */
  container: string;
  /** Searched inside the container */
  link: string;
  author?: string;
  timeIndicator?: string;
  score?: string;
  acceptUrl?: (url: URL) => boolean;
}

/** Reads the leading integer of texts like "128 points" */
export function parseLeadingInt(text: string | null | undefined): number | undefined {
  const match = /^\s*(\d[\d,]*)/.exec(text ?? "");
  if (!match) return undefined;
  const value = Number.parseInt(match[1].replace(/,/g, ""), 10);
  return Number.isNaN(value) ? undefined : value;
}

function find(selector: string | undefined) {
  if (selector === undefined) return undefined;
  return (candidate: Element): Element | null => candidate.querySelector(selector);
}

/** Builds a strategy whose lookups are all plain CSS selectors */
export function cssStrategy(options: CssStrategyOptions): SelectorStrategy {
  const { score } = options;
  return {
    name: options.name,
    candidates: (document) => Array.from(document.querySelectorAll(options.container)),
    link: (candidate) => candidate.querySelector(options.link),
    author: find(options.author),
    timeIndicator: find(options.timeIndicator),
    score:
      score === undefined
        ? undefined
        : (candidate) => parseLeadingInt(candidate.querySelector(score)?.textContent),
    acceptUrl: options.acceptUrl,
  };
}
