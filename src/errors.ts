export type NewsErrorKind = "connection" | "timeout" | "parse" | "structure";

/**
 * Base class for the failures the pipeline reports to callers. Anything
 * thrown that is not a NewsPipelineError is an unexpected defect.
 */
export abstract class NewsPipelineError extends Error {
  abstract readonly kind: NewsErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** DNS, connect, TLS or non-success HTTP status */
export class ConnectionFailure extends NewsPipelineError {
  readonly kind = "connection" as const;
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    details: { status?: number; code?: string; cause?: unknown } = {}
  ) {
    super(message, details.cause);
    this.status = details.status;
    this.code = details.code;
  }
}

export class TimeoutFailure extends NewsPipelineError {
  readonly kind = "timeout" as const;

  constructor(
    readonly timeoutMs: number,
    cause?: unknown
  ) {
    super(`Request timed out after ${timeoutMs} ms`, cause);
  }
}

export class ParseFailure extends NewsPipelineError {
  readonly kind = "parse" as const;
}

/** The page parsed, but none of the selector strategies found an item */
export class StructureMismatch extends NewsPipelineError {
  readonly kind = "structure" as const;

  constructor(readonly strategies: string[]) {
    super(
      strategies.length > 0
        ? `No news items found with strategies: ${strategies.join(", ")}. The page layout has probably changed`
        : "No selector strategies configured"
    );
  }
}

export function isNewsPipelineError(value: unknown): value is NewsPipelineError {
  return value instanceof NewsPipelineError;
}
