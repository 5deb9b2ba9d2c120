import { ZodError } from "zod";
import type { Diagnostic } from "./types/transcript";

export type PipelineErrorKind =
  | "TransientError"
  | "MalformedResponse"
  | "CorrectionCountMismatch"
  | "ParseFailure"
  | "EmptyBatchResult"
  | "BatchAborted"
  | "ConfigError";

export interface PipelineError extends Error {
  kind: PipelineErrorKind;
  /** Whether a stage may try the same call again. */
  retryable: boolean;
}

/** Timeout, connection reset, rate limit or 5xx from the model provider. */
export class TransientError extends Error implements PipelineError {
  kind = "TransientError" as const;
  retryable = true;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientError";
  }
}

/** Model output that could not be turned into the stage's result. */
export class MalformedResponseError extends Error implements PipelineError {
  kind: PipelineErrorKind = "MalformedResponse";
  retryable = true;
  readonly rawResponse: string | null;
  constructor(message: string, rawResponse: string | null = null) {
    super(message);
    this.name = "MalformedResponseError";
    this.rawResponse = rawResponse;
  }
}

export class CorrectionCountMismatchError extends MalformedResponseError {
  readonly expected: number;
  readonly received: number;
  constructor(expected: number, received: number, rawResponse: string | null = null) {
    super(`Expected ${expected} corrected lines, received ${received}`, rawResponse);
    this.name = "CorrectionCountMismatchError";
    this.kind = "CorrectionCountMismatch";
    this.expected = expected;
    this.received = received;
  }
}

export class ParseFailureError extends Error implements PipelineError {
  kind = "ParseFailure" as const;
  retryable = false;
  readonly fileName: string;
  constructor(fileName: string, message: string, options?: { cause?: unknown }) {
    super(`Could not read ${fileName}: ${message}`, options);
    this.name = "ParseFailureError";
    this.fileName = fileName;
  }
}

export class EmptyBatchResultError extends Error implements PipelineError {
  kind = "EmptyBatchResult" as const;
  retryable = false;
  readonly diagnostics: readonly Diagnostic[];
  constructor(fileCount: number, diagnostics: readonly Diagnostic[]) {
    super(`No quotes were produced from ${fileCount} file${fileCount === 1 ? "" : "s"}`);
    this.name = "EmptyBatchResultError";
    this.diagnostics = diagnostics;
  }
}

export class BatchAbortedError extends Error implements PipelineError {
  kind = "BatchAborted" as const;
  retryable = false;
  constructor(message = "Batch was aborted") {
    super(message);
    this.name = "BatchAbortedError";
  }
}

export class ConfigError extends Error implements PipelineError {
  kind = "ConfigError" as const;
  retryable = false;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return (
    error instanceof TransientError ||
    error instanceof MalformedResponseError ||
    error instanceof ParseFailureError ||
    error instanceof EmptyBatchResultError ||
    error instanceof BatchAbortedError ||
    error instanceof ConfigError
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
