import { Agent, fetch } from "undici";

import { DEFAULT_USER_AGENT } from "./config.js";
import { ConnectionFailure, TimeoutFailure } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FetchResult } from "./types.js";

export interface TransportRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
  verifyCertificates: boolean;
}

export interface TransportResponse {
  status: number;
  /** Final URL after redirects, empty when the transport does not know it */
  url: string;
  body: string;
}

/**
 * Performs one GET and reads the whole body. Must reject once `signal`
 * aborts, the way fetch does.
 */
export type Transport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export interface FetchOptions {
  url: string;
  timeoutMs: number;
  verifyCertificates: boolean;
  userAgent?: string;
  transport?: Transport;
  logger?: Logger;
}

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

export const undiciTransport: Transport = async (url, request) => {
  // Per-call agent so an insecure request never leaks into the global dispatcher
  const dispatcher = request.verifyCertificates
    ? undefined
    : new Agent({ connect: { rejectUnauthorized: false } });

  try {
    const response = await fetch(url, {
      method: "GET",
      redirect: "follow",
      headers: request.headers,
      signal: request.signal,
      dispatcher,
    });
    const body = await response.text();
    return { status: response.status, url: response.url, body };
  } finally {
    await dispatcher?.close();
  }
};

function readCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value) {
    return typeof value.code === "string" ? value.code : undefined;
  }
  return undefined;
}

/** First error code found walking the `cause` chain */
export function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined; depth += 1) {
    const code = readCode(current);
    if (code) return code;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

/** Socket, DNS, TLS and undici codes; other `ERR_*` codes are programming errors */
export function isNetworkErrorCode(code: string): boolean {
  if (code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_")) return true;
  if (code.startsWith("ERR_")) return false;
  return /^(E[A-Z]+(_[A-Z]+)?|UND_ERR_[A-Z_]+|CERT_[A-Z_]+|UNABLE_TO_[A-Z_]+|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN)$/.test(
    code
  );
}

function classifyTransportError(
  error: unknown,
  url: string,
  timeoutMs: number,
  timedOut: boolean
): unknown {
  if (error instanceof TimeoutFailure) return error;
  if (timedOut) return new TimeoutFailure(timeoutMs, error);

  const code = findErrorCode(error);
  if (code && TIMEOUT_CODES.has(code)) return new TimeoutFailure(timeoutMs, error);

  // undici reports every network-level failure as TypeError("fetch failed")
  const networkCode = code !== undefined && isNetworkErrorCode(code) ? code : undefined;
  const isFetchFailure = error instanceof TypeError && error.message === "fetch failed";
  if (networkCode === undefined && !isFetchFailure) return error;

  const detail = networkCode ?? (error instanceof Error ? error.message : String(error));
  return new ConnectionFailure(`Failed to connect to ${url}: ${detail}`, {
    code: networkCode,
    cause: error,
  });
}

/**
 * Fetches the page with a single GET. The timeout covers connecting,
 * waiting for headers and reading the body. No retries.
 */
export async function fetchHomepage(options: FetchOptions): Promise<FetchResult> {
  const { url, timeoutMs } = options;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }

  const transport = options.transport ?? undiciTransport;
  const logger = options.logger ?? silentLogger;

  if (!options.verifyCertificates) {
    logger.warn("TLS certificate validation is disabled", { url });
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  // Settles only when the timer fires, so a transport that ignores the signal cannot outlive it
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => {
        reject(new TimeoutFailure(timeoutMs));
      },
      { once: true }
    );
  });

  let response: TransportResponse;
  try {
    const request = transport(url, {
      headers: {
        "user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
        accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "accept-language": "en-US,en;q=0.5",
      },
      signal: controller.signal,
      verifyCertificates: options.verifyCertificates,
    });
    response = await Promise.race([request, timedOut]);
  } catch (error) {
    throw classifyTransportError(error, url, timeoutMs, controller.signal.aborted);
  } finally {
    clearTimeout(timeout);
  }

  if (controller.signal.aborted) {
    throw new TimeoutFailure(timeoutMs);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new ConnectionFailure(`Failed to fetch ${url}: HTTP ${response.status}`, {
      status: response.status,
    });
  }

  logger.debug("Fetched page", { url, status: response.status, bytes: response.body.length });

  return {
    markup: response.body,
    url: response.url || url,
    status: response.status,
  };
}
