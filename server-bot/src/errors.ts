export type ErrorKind =
  | "ValidationError"
  | "SynthesisError"
  | "TranscodeError"
  | "DispatchError"
  | "TimeoutError";

export class PipelineError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Wraps anything thrown by a stage into a PipelineError of the stage's kind. */
export function toPipelineError(err: unknown, fallbackKind: ErrorKind): PipelineError {
  if (isPipelineError(err)) return err;
  return new PipelineError(fallbackKind, errorMessage(err), { cause: err });
}
