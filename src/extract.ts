import { JSDOM } from "jsdom";

import { CONFIG } from "./config.js";
import { ParseFailure, StructureMismatch } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { NewsItem, SelectorStrategy } from "./types.js";

export interface ExtractOptions {
  /** Used when an item has no author node */
  defaultAuthor?: string;
  logger?: Logger;
}

export interface Extraction {
  strategy: string;
  items: NewsItem[];
}

function collapseText(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/** Absolute http(s) URL or null */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    return url.href;
  } catch {
    return null;
  }
}

/**
 * jsdom recovers from almost any tag soup, so the checks here reject input
 * that is not an HTML document at all or was cut off mid-transfer.
 */
export function parseDocument(markup: string, baseUrl: string): Document {
  if (markup.trim() === "") {
    throw new ParseFailure("Markup is empty");
  }
  if (markup.includes("\u0000")) {
    throw new ParseFailure("Markup contains NUL bytes and is not an HTML document");
  }
  if (!/<[a-z!]/i.test(markup)) {
    throw new ParseFailure("Markup contains no HTML elements");
  }
  // End tags such as </body> and </html> are optional, so only a cut inside a tag or comment counts
  const tail = markup.trimEnd();
  if (tail.lastIndexOf("<!--") > tail.lastIndexOf("-->")) {
    throw new ParseFailure("Markup is truncated inside a comment");
  }
  if (/<[a-z!/][^<>]*$/i.test(tail)) {
    throw new ParseFailure("Markup is truncated inside a tag");
  }

  try {
    return new JSDOM(markup, { url: baseUrl }).window.document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseFailure(`Failed to parse markup: ${reason}`, error);
  }
}

function buildItem(
  candidate: Element,
  strategy: SelectorStrategy,
  baseUrl: string,
  defaultAuthor: string,
  logger: Logger
): NewsItem | null {
  const link = strategy.link(candidate);
  if (!link) {
    logger.debug("Skipping candidate without a link", { strategy: strategy.name });
    return null;
  }

  const title = collapseText(link.textContent) || collapseText(link.getAttribute("title"));
  if (!title) {
    logger.debug("Skipping candidate with an empty title", { strategy: strategy.name });
    return null;
  }

  const href = link.getAttribute("href") ?? "";
  const url = resolveUrl(href, baseUrl);
  if (!url) {
    logger.debug("Skipping candidate with an unresolvable link", { strategy: strategy.name, href });
    return null;
  }
  if (strategy.acceptUrl && !strategy.acceptUrl(new URL(url))) {
    logger.debug("Skipping candidate rejected by URL filter", { strategy: strategy.name, url });
    return null;
  }

  const author = collapseText(strategy.author?.(candidate)?.textContent) || defaultAuthor;
  const timeIndicator = collapseText(strategy.timeIndicator?.(candidate)?.textContent);
  const score = strategy.score?.(candidate);

  return score === undefined
    ? { title, url, author, timeIndicator }
    : { title, url, author, timeIndicator, score };
}

function runStrategy(
  document: Document,
  strategy: SelectorStrategy,
  baseUrl: string,
  limit: number,
  defaultAuthor: string,
  logger: Logger
): NewsItem[] {
  const items: NewsItem[] = [];
  const seen = new Set<string>();

  for (const candidate of strategy.candidates(document)) {
    if (items.length >= limit) break;

    const item = buildItem(candidate, strategy, baseUrl, defaultAuthor, logger);
    if (!item) continue;
    if (seen.has(item.url)) {
      logger.debug("Skipping duplicate URL", { strategy: strategy.name, url: item.url });
      continue;
    }

    seen.add(item.url);
    items.push(item);
  }

  return items;
}

/**
 * Extracts up to `limit` items in page order using the first strategy that
 * yields any. Strategies are never mixed within one pass.
 */
export function extractNewsWithStrategy(
  markup: string,
  baseUrl: string,
  limit: number,
  strategies: readonly SelectorStrategy[],
  options: ExtractOptions = {}
): Extraction {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
  if (resolveUrl(baseUrl, baseUrl) === null) {
    throw new RangeError(`baseUrl must be an absolute http(s) URL, got "${baseUrl}"`);
  }

  const document = parseDocument(markup, baseUrl);
  const defaultAuthor = options.defaultAuthor ?? CONFIG.news.defaultAuthor;
  const logger = options.logger ?? silentLogger;

  for (const strategy of strategies) {
    const items = runStrategy(document, strategy, baseUrl, limit, defaultAuthor, logger);
    if (items.length > 0) {
      return { strategy: strategy.name, items };
    }
    logger.debug("Strategy found no items", { strategy: strategy.name });
  }

  throw new StructureMismatch(strategies.map((strategy) => strategy.name));
}

export function extractNews(
  markup: string,
  baseUrl: string,
  limit: number,
  strategies: readonly SelectorStrategy[],
  options: ExtractOptions = {}
): NewsItem[] {
  return extractNewsWithStrategy(markup, baseUrl, limit, strategies, options).items;
}
