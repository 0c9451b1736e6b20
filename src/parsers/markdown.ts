import type { NewsItem, NewsResult } from "../types.js";

export type OutputFormat = "markdown" | "json";

function describeItem(item: NewsItem): string {
  const meta = [item.author];
  if (item.timeIndicator) meta.push(item.timeIndicator);
  if (item.score !== undefined) meta.push(`${item.score} points`);
  return meta.join(" | ");
}

export function formatNewsToMarkdown(items: NewsItem[]): string {
  if (items.length === 0) return "";

  return items
    .map((item, index) => `${index + 1}. **[${item.title}](${item.url})**\n   ${describeItem(item)}`)
    .join("\n\n");
}

/** Highest score first, items without a score keep their order at the end */
export function sortByScore(items: NewsItem[]): NewsItem[] {
  return [...items].sort((a, b) => (b.score ?? -1) - (a.score ?? -1));
}

export function formatNewsResult(result: NewsResult, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(result.items, null, 2);
  }
  const count = result.items.length;
  const heading = `## ${result.siteName} (${count} ${count === 1 ? "item" : "items"})\n\nSource: ${result.url}`;
  return `${heading}\n\n${formatNewsToMarkdown(result.items)}`;
}
