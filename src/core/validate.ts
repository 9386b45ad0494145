/**
 * Runtime validation for engine configuration and scan frames.
 * Provides lightweight validation without external dependencies.
 */

import type { EngineConfig, ScanFrame } from "./types.js";
import { InvalidConfigurationError, MalformedFrameError } from "./errors.js";
import { BEAM_COUNT } from "./constants.js";

export { InvalidConfigurationError, MalformedFrameError };

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  history_size: 30,
  min_segment_beams: 5,
  gap_merge_beams: 2,
  drift_tolerance_beams: 3,
  persistence_threshold: 0.7,
  min_occlusion_width_deg: 5.0,
  angle_min_deg: -180.0,
  angle_span_deg: 360.0,
  treat_ge_max_as_inf: false,
  max_range: Infinity,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIntegerAtLeast(value: unknown, min: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Return `value` when it passes `guard`; otherwise record `message` and fall
 * back to the default. The caller throws whenever a message was recorded.
 */
function checked<T>(
  value: unknown,
  guard: (v: unknown) => v is T,
  message: string,
  errors: string[],
  fallback: T
): T {
  if (guard(value)) return value;
  errors.push(message);
  return fallback;
}

/**
 * A reading is either a finite non-negative distance or the "no return"
 * sentinel (positive or negative infinity).
 */
export function isValidReading(value: unknown): value is number {
  if (typeof value !== "number" || Number.isNaN(value)) return false;
  return !Number.isFinite(value) || value >= 0;
}

/**
 * Merge overrides onto the defaults and validate every knob.
 *
 * @throws InvalidConfigurationError listing every knob outside its domain
 */
export function validateConfig(overrides: unknown = {}): Readonly<EngineConfig> {
  if (!isRecord(overrides)) {
    throw new InvalidConfigurationError(["Configuration must be an object"]);
  }

  const merged: Record<string, unknown> = { ...DEFAULT_ENGINE_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const errors: string[] = [];

  const config: EngineConfig = {
    history_size: checked(
      merged.history_size,
      (v): v is number => isIntegerAtLeast(v, 1),
      "history_size must be an integer >= 1",
      errors,
      DEFAULT_ENGINE_CONFIG.history_size
    ),
    min_segment_beams: checked(
      merged.min_segment_beams,
      (v): v is number => isIntegerAtLeast(v, 1),
      "min_segment_beams must be an integer >= 1",
      errors,
      DEFAULT_ENGINE_CONFIG.min_segment_beams
    ),
    gap_merge_beams: checked(
      merged.gap_merge_beams,
      (v): v is number => isIntegerAtLeast(v, 0),
      "gap_merge_beams must be an integer >= 0",
      errors,
      DEFAULT_ENGINE_CONFIG.gap_merge_beams
    ),
    drift_tolerance_beams: checked(
      merged.drift_tolerance_beams,
      (v): v is number => isFiniteNumber(v) && v >= 0,
      "drift_tolerance_beams must be a non-negative number",
      errors,
      DEFAULT_ENGINE_CONFIG.drift_tolerance_beams
    ),
    persistence_threshold: checked(
      merged.persistence_threshold,
      (v): v is number => isFiniteNumber(v) && v >= 0 && v <= 1,
      "persistence_threshold must be a number between 0 and 1",
      errors,
      DEFAULT_ENGINE_CONFIG.persistence_threshold
    ),
    min_occlusion_width_deg: checked(
      merged.min_occlusion_width_deg,
      (v): v is number => isFiniteNumber(v) && v >= 0,
      "min_occlusion_width_deg must be a non-negative number",
      errors,
      DEFAULT_ENGINE_CONFIG.min_occlusion_width_deg
    ),
    angle_min_deg: checked(
      merged.angle_min_deg,
      isFiniteNumber,
      "angle_min_deg must be a finite number",
      errors,
      DEFAULT_ENGINE_CONFIG.angle_min_deg
    ),
    angle_span_deg: checked(
      merged.angle_span_deg,
      (v): v is number => isFiniteNumber(v) && v > 0,
      "angle_span_deg must be a number > 0",
      errors,
      DEFAULT_ENGINE_CONFIG.angle_span_deg
    ),
    treat_ge_max_as_inf: checked(
      merged.treat_ge_max_as_inf,
      (v): v is boolean => typeof v === "boolean",
      "treat_ge_max_as_inf must be a boolean",
      errors,
      DEFAULT_ENGINE_CONFIG.treat_ge_max_as_inf
    ),
    max_range: checked(
      merged.max_range,
      (v): v is number => typeof v === "number" && !Number.isNaN(v) && v > 0,
      "max_range must be a number > 0",
      errors,
      DEFAULT_ENGINE_CONFIG.max_range
    ),
  };

  if (errors.length > 0) {
    throw new InvalidConfigurationError(errors);
  }

  return Object.freeze(config);
}

/**
 * Validate a scan frame and return a frozen copy.
 *
 * @param line Source line, attached to the error when validation fails
 * @throws MalformedFrameError listing every problem found
 */
export function validateScanFrame(data: unknown, line?: number): ScanFrame {
  if (!isRecord(data)) {
    throw new MalformedFrameError(["Frame must be an object"], undefined, line);
  }

  const errors: string[] = [];
  const { timestep, ranges } = data;
  const knownTimestep = typeof timestep === "number" ? timestep : undefined;

  if (typeof timestep !== "number" || !Number.isSafeInteger(timestep)) {
    errors.push("timestep must be a safe integer");
  }

  if (!Array.isArray(ranges)) {
    errors.push("ranges must be an array");
  } else {
    if (ranges.length !== BEAM_COUNT) {
      errors.push(`ranges must contain exactly ${BEAM_COUNT} values, got ${ranges.length}`);
    }
    ranges.forEach((value: unknown, i) => {
      if (!isValidReading(value)) {
        errors.push(`ranges[${i}] must be a non-negative number or Infinity, got ${String(value)}`);
      }
    });
  }

  if (errors.length > 0 || typeof timestep !== "number" || !Array.isArray(ranges)) {
    throw new MalformedFrameError(errors, knownTimestep, line);
  }

  const readings: number[] = ranges.filter(isValidReading);
  return Object.freeze({ timestep, ranges: Object.freeze(readings) });
}

/**
 * Build a validated, immutable scan frame.
 */
export function createScanFrame(timestep: number, ranges: readonly number[]): ScanFrame {
  return validateScanFrame({ timestep, ranges });
}
