/**
 * Base class for every failure the digest run reports to the operator
 */
export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * LinkAce could not be reached, rejected the request or answered with
 * something that is not a link listing
 */
export class FetchError extends DigestError {
  readonly status: number | null;
  readonly body: string | null;

  constructor(
    message: string,
    details: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.status = details.status ?? null;
    this.body = details.body ?? null;
  }
}

/**
 * The LLM call failed or its answer could not be used
 */
export class GenerationError extends DigestError {
  readonly status: number | null;

  constructor(message: string, details: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status ?? null;
  }
}

/**
 * The LLM answered, but not in the section/summary shape we asked for
 */
export class ParseError extends GenerationError {
  readonly raw: string;

  constructor(message: string, raw: string, cause?: unknown) {
    super(message, { cause });
    this.raw = raw;
  }
}

export class WriteError extends DigestError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.path = path;
  }
}

export class ConfigError extends DigestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

export class ReviewAbortedError extends DigestError {
  constructor() {
    super("Review aborted by editor, nothing was written");
  }
}

/**
 * Message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
