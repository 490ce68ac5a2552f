/**
 * Base class for failures raised by the resolution core.
 *
 * `retryable` tells the caller whether submitting the same request again can
 * succeed. The core itself never retries.
 */
export abstract class RecognitionError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DimensionMismatchError extends RecognitionError {
  readonly code = 'dimension_mismatch';
  readonly retryable = true;

  constructor(readonly left: number, readonly right: number) {
    super(`Embedding dimensions differ: ${left} vs ${right}`);
  }
}

export class IdentityCodeCollisionError extends RecognitionError {
  readonly code = 'identity_code_collision';
  readonly retryable = true;

  constructor(readonly bucket: string) {
    super(`No free display code left for bucket ${bucket}`);
  }
}

export class InvalidThresholdError extends RecognitionError {
  readonly code = 'invalid_threshold';
  readonly retryable = false;

  constructor(readonly threshold: number) {
    super(`Threshold must be within (0, 1], got ${threshold}`);
  }
}

export class FaceAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FaceAnalysisError';
  }
}
