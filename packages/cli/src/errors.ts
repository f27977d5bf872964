/**
 * Error taxonomy for the generation pipeline.
 *
 * Every error the engine records on a project carries a `kind` so it can be
 * persisted and reported without keeping the original Error instance around.
 */

import type { WorkStage } from "./state/types.js";

export const ERROR_KINDS = [
  "ValidationError",
  "PathViolation",
  "ToolExecutionError",
  "BudgetExhausted",
  "ExternalServiceError",
  "Interrupted",
  "StageFailed",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  /** Whether a retry at the same scope can reasonably succeed. */
  abstract readonly recoverable: boolean;
}

/**
 * Stage output did not match its schema. `issues` holds one `path: message`
 * entry per violated field.
 */
export class ValidationError extends PipelineError {
  readonly kind = "ValidationError";
  readonly recoverable = true;

  constructor(
    public readonly issues: string[],
    label = "output"
  ) {
    super(`Invalid ${label}: ${issues.join("; ")}`);
    this.name = "ValidationError";
  }

  /** Corrective feedback appended to the next generation attempt. */
  toFeedback(): string {
    return this.issues.map((issue) => `- ${issue}`).join("\n");
  }
}

export class PathViolation extends PipelineError {
  readonly kind = "PathViolation";
  readonly recoverable = false;

  constructor(
    public readonly requestedPath: string,
    public readonly root: string
  ) {
    super(`Path escapes project root: ${requestedPath}`);
    this.name = "PathViolation";
  }
}

export class ToolExecutionError extends PipelineError {
  readonly kind = "ToolExecutionError";
  readonly recoverable = true;

  constructor(
    message: string,
    public readonly tool: string,
    public readonly code: "not_found" | "timeout" | "disabled" | "rejected" | "failed" = "failed"
  ) {
    super(message);
    this.name = "ToolExecutionError";
  }
}

export class BudgetExhausted extends PipelineError {
  readonly kind = "BudgetExhausted";
  readonly recoverable = false;

  constructor(
    public readonly scope: "iterations" | "retries",
    message: string
  ) {
    super(message);
    this.name = "BudgetExhausted";
  }
}

export class ExternalServiceError extends PipelineError {
  readonly kind = "ExternalServiceError";

  constructor(
    message: string,
    public readonly recoverable: boolean,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = "ExternalServiceError";
  }
}

export class InterruptedError extends PipelineError {
  readonly kind = "Interrupted";
  readonly recoverable = false;

  constructor(message = "Run cancelled") {
    super(message);
    this.name = "InterruptedError";
  }
}

/**
 * A stage gave up after exhausting its own recovery. Wraps the error that
 * caused it so the pipeline can record the underlying kind.
 */
export class StageFailedError extends PipelineError {
  readonly kind = "StageFailed";
  readonly recoverable = false;

  constructor(
    public readonly stage: WorkStage,
    public readonly reason: { kind: ErrorKind; message: string },
    public readonly taskId: string | null = null
  ) {
    super(`Stage ${stage} failed: ${reason.message}`);
    this.name = "StageFailedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Kind and message of any thrown value, for persisting on a project. */
export function describeError(error: unknown): { kind: ErrorKind; message: string } {
  if (error instanceof StageFailedError) {
    return error.reason;
  }
  if (error instanceof PipelineError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "StageFailed", message: errorMessage(error) };
}

/** `code` of a Node system error (ENOENT, EISDIR, ...), if present. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
