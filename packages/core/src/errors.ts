/**
 * Pipeline error classes.
 *
 * Per-page failures never surface as one of these; they become `failed` page
 * outcomes. Everything here propagates to the caller and is rendered by the
 * API's error middleware as `{ error: category, message }`.
 */

export type PipelineErrorCategory =
  | 'INPUT_INVALID'
  | 'RASTERIZATION_FAILED'
  | 'ACQUISITION_TIMEOUT'
  | 'CONVERSION_FAILED'
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** The source document cannot be opened at all; no fallback is attempted. */
export class DocumentOpenError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INPUT_INVALID', 400, options);
    this.name = 'DocumentOpenError';
  }
}

export class RasterizationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RASTERIZATION_FAILED', 500, options);
    this.name = 'RasterizationError';
  }
}

export class AcquisitionTimeoutError extends PipelineError {
  constructor(public readonly timeoutMs: number) {
    super(`Text acquisition exceeded ${timeoutMs} ms`, 'ACQUISITION_TIMEOUT', 504);
    this.name = 'AcquisitionTimeoutError';
  }
}

export class ConversionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONVERSION_FAILED', 500, options);
    this.name = 'ConversionError';
  }
}

export class BadRequestError extends PipelineError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST', 400);
    this.name = 'BadRequestError';
  }
}

export class PayloadTooLargeError extends PipelineError {
  constructor(message: string) {
    super(message, 'PAYLOAD_TOO_LARGE', 413);
    this.name = 'PayloadTooLargeError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
