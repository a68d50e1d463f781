export type CircleErrorKind =
  | 'InvalidCenter'
  | 'InvalidRadius'
  | 'InvalidPointCount'
  | 'InvalidRescaleDivisor'
  | 'DegenerateCrossing'
  | 'UnsupportedCrossings'
  | 'WrappingBatch'
  | 'InvalidLocations';

/**
 * Input or geometry failure for a single circle. The pipeline records these
 * per location instead of aborting the whole run.
 */
export class CircleError extends Error {
  readonly kind: CircleErrorKind;
  readonly details?: unknown;

  constructor(kind: CircleErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'CircleError';
    this.kind = kind;
    this.details = details;
  }
}

export function isCircleError(err: unknown): err is CircleError {
  return err instanceof CircleError;
}
