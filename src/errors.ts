// Poise Meter - Error taxonomy
//
// Fatal errors (source unavailable, frame read) end a run and surface as one
// message. Classification errors are recovered inside the samplers. Export
// errors are reported as a non-fatal status.

export type AnalysisErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "FRAME_READ_FAILURE"
  | "CLASSIFICATION_FAILURE"
  | "EMPTY_INPUT"
  | "EXPORT_FAILURE";

export class AnalysisError extends Error {
  public readonly code: AnalysisErrorCode;

  constructor(message: string, code: AnalysisErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Video file or camera could not be opened. */
export class SourceUnavailableError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SOURCE_UNAVAILABLE", options);
  }
}

export class FrameReadError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "FRAME_READ_FAILURE", options);
  }
}

export class ClassificationError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CLASSIFICATION_FAILURE", options);
  }
}

/** Statistics were requested over zero samples. Callers are expected to prevent this. */
export class EmptyInputError extends AnalysisError {
  constructor(message = "No emotion data available: cannot summarize an empty sample table.") {
    super(message, "EMPTY_INPUT");
  }
}

export class ExportError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EXPORT_FAILURE", options);
  }
}

/** Human-readable message for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
