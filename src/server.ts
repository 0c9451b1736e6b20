import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  CONFIG,
  FETCH_NEWS_TOOL_DESCRIPTION,
  LIST_NEWS_SITES_TOOL_DESCRIPTION,
} from "./config.js";
import { isNewsPipelineError } from "./errors.js";
import { fetchNews, type NewsContext } from "./news.js";
import { formatNewsResult, listSiteProfiles, sortByScore, type OutputFormat } from "./parsers/index.js";
import { SITE_IDS } from "./types.js";

export type TextContent = { type: "text"; text: string };

export type ToolResult = { content: TextContent[]; isError?: boolean };

export type FetchNewsArgs = {
  site?: string;
  limit?: number;
  timeoutMs?: number;
  sortBy?: "page" | "score";
  format?: OutputFormat;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

/** Error kinds get a bracketed tag so callers can tell them apart */
export function describeToolError(error: unknown): string {
  if (isNewsPipelineError(error)) {
    return `Error [${error.kind}]: ${error.message}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export async function runFetchNewsTool(args: FetchNewsArgs, context: NewsContext): Promise<ToolResult> {
  const site = args.site ?? context.config.defaultSite;
  try {
    const result = await fetchNews(site, context, {
      limit: args.limit,
      timeoutMs: args.timeoutMs,
    });
    const items = args.sortBy === "score" ? sortByScore(result.items) : result.items;
    return textResult(formatNewsResult({ ...result, items }, args.format ?? "markdown"));
  } catch (error) {
    if (isNewsPipelineError(error)) {
      context.logger.warn("fetch_news failed", { site, kind: error.kind, error });
    } else {
      context.logger.error("fetch_news failed unexpectedly", { site, error });
    }
    return { isError: true, content: [{ type: "text", text: describeToolError(error) }] };
  }
}

export function runListNewsSitesTool(): ToolResult {
  const sites = listSiteProfiles().map((profile) => ({
    id: profile.id,
    name: profile.name,
    url: profile.targetUrl,
  }));
  return textResult(JSON.stringify(sites));
}

export function createServer(context: NewsContext): McpServer {
  const server = new McpServer(CONFIG.server);

  server.registerTool(
    "fetch_news",
    {
      description: FETCH_NEWS_TOOL_DESCRIPTION,
      inputSchema: {
        site: z
          .enum(SITE_IDS)
          .optional()
          .describe(`News site, default "${context.config.defaultSite}"`),
        limit: z
          .number()
          .int()
          .min(1)
          .max(CONFIG.news.maxLimit)
          .optional()
          .describe(
            `Maximum number of items, from 1 to ${CONFIG.news.maxLimit}, default ${context.config.limit}`
          ),
        timeoutMs: z
          .number()
          .int()
          .min(CONFIG.news.minTimeoutMs)
          .max(CONFIG.news.maxTimeoutMs)
          .optional()
          .describe(
            `Request timeout in ms, default ${context.config.timeoutMs}, max ${CONFIG.news.maxTimeoutMs}`
          ),
        sortBy: z
          .enum(["page", "score"])
          .optional()
          .describe('"page" keeps the homepage order (default), "score" puts the most upvoted first'),
        format: z
          .enum(["markdown", "json"])
          .optional()
          .describe("Output format, default markdown"),
      },
    },
    async (args) => runFetchNewsTool(args, context)
  );

  server.registerTool(
    "list_news_sites",
    {
      description: LIST_NEWS_SITES_TOOL_DESCRIPTION,
      inputSchema: {},
    },
    async () => runListNewsSitesTool()
  );

  return server;
}
