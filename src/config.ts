import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { SITE_IDS, type SiteId } from "./types.js";

export const CONFIG = {
  server: {
    name: "news-headlines-service",
    version: "1.0.0",
  },
  news: {
    defaultLimit: 20,
    maxLimit: 100,
    defaultTimeoutMs: 10000,
    minTimeoutMs: 1000,
    maxTimeoutMs: 120000,
    defaultAuthor: "Unknown",
    defaultSite: "yahoo",
  },
} as const;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const FETCH_NEWS_TOOL_DESCRIPTION =
  "Fetches the homepage of a news aggregator and returns its current headlines " +
  "with title, link, author or source, and the time indicator shown on the page. " +
  `Sites: ${SITE_IDS.join(", ")}. Maximum ${CONFIG.news.maxLimit} items per request.`;

export const LIST_NEWS_SITES_TOOL_DESCRIPTION =
  "Lists the news sites supported by fetch_news with their homepage URLs.";

export interface NewsConfig {
  limit: number;
  timeoutMs: number;
  /** Turning this off accepts any TLS certificate, only for local debugging */
  verifyCertificates: boolean;
  userAgent: string;
  defaultAuthor: string;
  defaultSite: SiteId;
  port: number;
  logLevel: LogLevel;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const envBoolean = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return fallback;
        const normalized = value.trim().toLowerCase();
        if (TRUE_VALUES.has(normalized)) return true;
        if (FALSE_VALUES.has(normalized)) return false;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a boolean flag, got "${value}"`,
        });
        return z.NEVER;
      })
  );

const envInt = (fallback: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(max).default(fallback));

const envText = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().min(1).default(fallback));

const envLower = (value: unknown): unknown => {
  const blank = blankToUndefined(value);
  return typeof blank === "string" ? blank.trim().toLowerCase() : blank;
};

const EnvSchema = z.object({
  NEWS_LIMIT: envInt(CONFIG.news.defaultLimit, CONFIG.news.maxLimit),
  NEWS_TIMEOUT_MS: envInt(CONFIG.news.defaultTimeoutMs, CONFIG.news.maxTimeoutMs),
  NEWS_VERIFY_CERTIFICATES: envBoolean(true),
  NEWS_USER_AGENT: envText(DEFAULT_USER_AGENT),
  NEWS_DEFAULT_AUTHOR: envText(CONFIG.news.defaultAuthor),
  NEWS_DEFAULT_SITE: z.preprocess(envLower, z.enum(SITE_IDS).default(CONFIG.news.defaultSite)),
  PORT: envInt(3000, 65535),
  LOG_LEVEL: z.preprocess(envLower, z.enum(LOG_LEVELS).default("info")),
});

/**
 * Reads the service configuration from the environment. Invalid values
 * throw a ZodError instead of silently falling back.
 */
export function loadNewsConfig(env: NodeJS.ProcessEnv = process.env): NewsConfig {
  const parsed = EnvSchema.parse(env);
  return Object.freeze({
    limit: parsed.NEWS_LIMIT,
    timeoutMs: parsed.NEWS_TIMEOUT_MS,
    verifyCertificates: parsed.NEWS_VERIFY_CERTIFICATES,
    userAgent: parsed.NEWS_USER_AGENT,
    defaultAuthor: parsed.NEWS_DEFAULT_AUTHOR,
    defaultSite: parsed.NEWS_DEFAULT_SITE,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
  });
}
