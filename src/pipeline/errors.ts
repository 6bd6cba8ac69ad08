/**
 * Turn-level failures. Per-source problems are reported as ExtractionResult
 * values instead and never reach these classes.
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The search provider was unreachable or returned an error */
export class RetrievalError extends PipelineError {}

export type StreamErrorKind = 'connection' | 'timeout' | 'http_status' | 'record' | 'aborted';

/** The generation backend failed before or during streaming */
export class StreamError extends PipelineError {
  readonly kind: StreamErrorKind;
  readonly status?: number;

  constructor(
    kind: StreamErrorKind,
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
