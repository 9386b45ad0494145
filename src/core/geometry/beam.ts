/**
 * Beam index / angle helpers on the 360-beam ring.
 *
 * Angles are normalized into [-180, 180). Every printed angle range goes
 * through `beamToDegrees`, so the convention holds across the output.
 */

import { BEAM_COUNT, FULL_TURN_DEG } from "../constants.js";

/**
 * Wrap any integer onto the ring [0, 359].
 */
export function beamIndex(i: number): number {
  return ((i % BEAM_COUNT) + BEAM_COUNT) % BEAM_COUNT;
}

/**
 * Normalize an angle into [-180, 180).
 */
export function normalizeDegrees(deg: number): number {
  const half = FULL_TURN_DEG / 2;
  const wrapped = (((deg + half) % FULL_TURN_DEG) + FULL_TURN_DEG) % FULL_TURN_DEG - half;
  return Object.is(wrapped, -0) ? 0 : wrapped;
}

/**
 * Angle of a beam: `angleMinDeg + beam * angleSpanDeg / 360`, normalized into [-180, 180).
 */
export function beamToDegrees(beam: number, angleMinDeg: number, angleSpanDeg: number): number {
  return normalizeDegrees(angleMinDeg + beam * (angleSpanDeg / BEAM_COUNT));
}

/**
 * Minimal distance between two beam indices on the ring.
 */
export function circularDistance(a: number, b: number): number {
  const d = Math.abs(a - b) % BEAM_COUNT;
  return Math.min(d, BEAM_COUNT - d);
}

/**
 * True when a segment crosses the 359 -> 0 boundary.
 */
export function wraps(start: number, end: number): boolean {
  return end < start;
}

/**
 * Number of beams in the inclusive range [start, end], accounting for wrap.
 */
export function segmentWidth(start: number, end: number): number {
  return wraps(start, end) ? BEAM_COUNT - start + end + 1 : end - start + 1;
}

/**
 * Integer circular midpoint of a run of `width` beams starting at `start`.
 */
export function circularCenter(start: number, width: number): number {
  return beamIndex(start + Math.floor((width - 1) / 2));
}

/**
 * Angular width covered by `widthBeams` beams.
 */
export function widthToDegrees(widthBeams: number, angleSpanDeg: number): number {
  return (widthBeams * Math.abs(angleSpanDeg)) / BEAM_COUNT;
}
