/**
 * Error kinds raised across the provision / rasterize / extract steps.
 *
 * Every class sets `name` so the CLI can print a stable label, and keeps
 * the original failure as `cause`.
 */

export class DeploymentError extends Error {
  readonly command: string;
  readonly stderr: string | null;

  constructor(params: { message: string; command: string; stderr?: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = "DeploymentError";
    this.command = params.command;
    this.stderr = params.stderr?.trim() || null;
  }
}

export class DocumentDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentDecodeError";
  }
}

export class PageRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PageRangeError";
  }
}

export class EmptyDocumentError extends Error {
  constructor(message = "Document has no pages to rasterize") {
    super(message);
    this.name = "EmptyDocumentError";
  }
}

export class ConnectionSettingsError extends Error {
  readonly missingKeys: string[];

  constructor(envFile: string, missingKeys: string[]) {
    super(`Missing ${missingKeys.join(", ")} in ${envFile}`);
    this.name = "ConnectionSettingsError";
    this.missingKeys = missingKeys;
  }
}

// ============================================================================
// Inference failures
// ============================================================================

export abstract class InferenceError extends Error {}

export class InferenceHttpError extends InferenceError {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  /** Raw response body, truncated to 2000 chars */
  readonly body: string;

  constructor(params: { status: number; statusText: string; url: string; body: string }) {
    super(`Inference request failed (${params.status} ${params.statusText})`);
    this.name = "InferenceHttpError";
    this.status = params.status;
    this.statusText = params.statusText;
    this.url = params.url;
    this.body = params.body.slice(0, 2000);
  }
}

export class TransportError extends InferenceError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Inference request could not be sent: ${reason}`, { cause });
    this.name = "TransportError";
    this.url = url;
  }
}

export class ResponseShapeError extends InferenceError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`Unexpected inference response: ${issues.join("; ")}`, options);
    this.name = "ResponseShapeError";
    this.issues = issues;
  }
}
