export type GradationErrorKind =
  | "ConfigurationError"
  | "ValidationError"
  | "InsufficientDataError"
  | "OutOfRangeError"
  | "RenderError";

export abstract class GradationError extends Error {
  abstract readonly kind: GradationErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed sieve scale or config file. Fatal at startup. */
export class ConfigurationError extends GradationError {
  readonly kind = "ConfigurationError" as const;
}

/** Request shape does not line up with the sieve scale. */
export class ValidationError extends GradationError {
  readonly kind = "ValidationError" as const;
}

export class InsufficientDataError extends GradationError {
  readonly kind = "InsufficientDataError" as const;

  constructor(message: string, readonly knownPoints: number, readonly required: number) {
    super(message);
  }
}

/** Curve does not bracket the requested percent; the caller reports the value as undefined. */
export class OutOfRangeError extends GradationError {
  readonly kind = "OutOfRangeError" as const;

  constructor(readonly percent: number, readonly minPercent: number, readonly maxPercent: number) {
    super(`${percent}% passing is outside the curve range [${minPercent}, ${maxPercent}]`);
  }
}

export class RenderError extends GradationError {
  readonly kind = "RenderError" as const;
}

export function isGradationError(err: unknown): err is GradationError {
  return err instanceof GradationError;
}
