import express from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import { CONFIG } from "./config.js";
import type { NewsContext } from "./news.js";
import { listSiteProfiles } from "./parsers/index.js";
import { createServer } from "./server.js";

export const METHOD_NOT_ALLOWED = {
  error: "Method Not Allowed",
  message: "Send MCP requests as POST /mcp. Headline fetches are stateless, so there is no session stream to open.",
} as const;

/** Root payload: what the service serves and where */
export function serviceInfo() {
  return {
    name: CONFIG.server.name,
    version: CONFIG.server.version,
    description: "Latest headlines from news aggregator homepages as MCP tools",
    endpoint: "POST /mcp",
    tools: ["fetch_news", "list_news_sites"],
    sites: listSiteProfiles().map((profile) => profile.id),
  };
}

export function healthStatus(now: Date) {
  return {
    status: "healthy",
    service: CONFIG.server.name,
    version: CONFIG.server.version,
    sites: listSiteProfiles().length,
    timestamp: now.toISOString(),
  };
}

export function createApp(context: NewsContext): express.Express {
  const { logger } = context;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.status(200).json(serviceInfo());
  });

  app.get("/health", (_req, res) => {
    res.status(200).json(healthStatus(new Date()));
  });

  app.get("/mcp", (_req, res) => {
    res.status(405).set("Allow", "POST").json(METHOD_NOT_ALLOWED);
  });

  // Stateless: a fresh server and transport per request
  app.post("/mcp", async (req, res) => {
    const server = createServer(context);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn("Failed to close MCP transport", { error });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error("MCP request failed", { error });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  return app;
}

export async function runServer(context: NewsContext): Promise<void> {
  const { port } = context.config;
  const app = createApp(context);

  await new Promise<void>((resolve, reject) => {
    const httpServer = app.listen(port, () => {
      context.logger.info(`${CONFIG.server.name} started on http://localhost:${port}`);
      context.logger.info(`MCP endpoint: POST http://localhost:${port}/mcp`);
      resolve();
    });
    httpServer.on("error", reject);
  });
}
