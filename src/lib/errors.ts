import type { ExplanationReason } from "./types";

export type PipelineErrorKind =
  | "evidence_unavailable"
  | "generation_failed"
  | "extraction_failed"
  | "chart_unavailable";

/**
 * Base class for hard failures of a pipeline stage. Missing data is never one of
 * these; it travels as an `explained` StageResult instead.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, opts: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.details = opts.details;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, kind: this.kind, message: this.message, details: this.details };
  }
}

/** The graph or vector store could not be queried. */
export class EvidenceUnavailableError extends PipelineError {
  readonly kind = "evidence_unavailable" as const;
}

/** The language model call failed or timed out. */
export class GenerationError extends PipelineError {
  readonly kind = "generation_failed" as const;
}

export class ExtractionError extends PipelineError {
  readonly kind = "extraction_failed" as const;
}

/**
 * Raised by `renderOrThrow` when a descriptor cannot be drawn. This is the designed
 * "no chart" path, not a defect.
 */
export class ChartUnavailableError extends PipelineError {
  readonly kind = "chart_unavailable" as const;
  readonly reason: ExplanationReason;

  constructor(reason: ExplanationReason, message: string) {
    super(message, { details: { reason } });
    this.reason = reason;
  }
}

export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}
