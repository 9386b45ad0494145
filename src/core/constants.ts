/**
 * Centralized constants for the occlusion engine.
 *
 * The beam count is fixed: every scan frame carries one reading per degree.
 */

/**
 * Number of beams in every scan frame.
 */
export const BEAM_COUNT = 360;

/**
 * Full turn in degrees. Used for angle normalization.
 */
export const FULL_TURN_DEG = 360;

/**
 * Tolerance applied when `treat_ge_max_as_inf` compares a reading
 * against `max_range`. Readings within this distance of the maximum count as
 * "no return".
 */
export const EPS_MAX_RANGE = 1e-6;

/**
 * Decimal places used when printing angles in output rows.
 */
export const ANGLE_DECIMALS = 1;

/**
 * Decimal places used when printing stability scores in output rows.
 */
export const STABILITY_DECIMALS = 2;

/**
 * Separator between segments inside a multi-valued output field.
 */
export const SEGMENT_SEPARATOR = "; ";
