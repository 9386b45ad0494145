/**
 * Domain-specific error types for the occlusion engine.
 *
 * These errors carry the context a caller needs to decide whether to skip a
 * row, abort a run, or fix its configuration.
 */

/**
 * Base error class for all occlusion engine errors.
 */
export class OcclusionEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OcclusionEngineError";
  }
}

/**
 * Error thrown when input validation fails.
 * Contains an array of all validation errors found.
 */
export class ValidationError extends OcclusionEngineError {
  readonly errors: string[];

  constructor(errors: string[], prefix = "Validation failed") {
    super(`${prefix}: ${errors.join("; ")}`);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * Error thrown when an engine is constructed with a knob outside its domain.
 * The engine is never instantiated in that case.
 */
export class InvalidConfigurationError extends ValidationError {
  constructor(errors: string[]) {
    super(errors, "Invalid configuration");
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Error thrown when a frame does not hold exactly 360 valid readings.
 * Recoverable: the engine state is left untouched.
 */
export class MalformedFrameError extends ValidationError {
  readonly timestep?: number;
  /** 1-based line in the source document, when the frame came from a row */
  readonly line?: number;

  constructor(errors: string[], timestep?: number, line?: number) {
    super(errors, "Malformed frame");
    this.name = "MalformedFrameError";
    this.timestep = timestep;
    this.line = line;
  }
}

/**
 * Error thrown when a frame's timestep is not strictly greater than the
 * previously processed one. The frame is not processed.
 */
export class OutOfOrderFrameError extends OcclusionEngineError {
  readonly timestep: number;
  readonly previousTimestep: number;

  constructor(timestep: number, previousTimestep: number) {
    super(
      `Frame timestep ${timestep} is not greater than the previous timestep ${previousTimestep}`
    );
    this.name = "OutOfOrderFrameError";
    this.timestep = timestep;
    this.previousTimestep = previousTimestep;
  }
}
