export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed configuration. Raised by the upfront validation pass, before any I/O. */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Configuration is invalid:\n${formatIssues(issues)}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class TransientProviderError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransientProviderError";
    this.status = options.status;
  }
}

export class PermanentProviderError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PermanentProviderError";
    this.status = options.status;
  }
}

export class FeedFetchError extends Error {
  readonly url: string;

  constructor(url: string, message: string, options: { cause?: unknown } = {}) {
    super(`Feed unreachable or unparseable: ${url} (${message})`, { cause: options.cause });
    this.name = "FeedFetchError";
    this.url = url;
  }
}

export class CacheIOError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CacheIOError";
  }
}

/** A digest history file that cannot be read, parsed or written. */
export class HistoryIOError extends Error {
  readonly digestId: string;

  constructor(digestId: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "HistoryIOError";
    this.digestId = digestId;
  }
}

export class DigestAbortedError extends Error {
  readonly digestId: string;
  readonly sourceUrl: string;

  constructor(digestId: string, sourceUrl: string, cause: PermanentProviderError) {
    super(`Digest "${digestId}" aborted at source ${sourceUrl}: ${cause.message}`, { cause });
    this.name = "DigestAbortedError";
    this.digestId = digestId;
    this.sourceUrl = sourceUrl;
  }
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `- ${issue.path}: ${issue.message}`).join("\n");
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
