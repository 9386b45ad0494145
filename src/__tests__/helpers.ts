import { createScanFrame } from "../core/validate.js";
import { BEAM_COUNT } from "../core/constants.js";
import { segmentWidth } from "../core/geometry/beam.js";
import type { ScanFrame } from "../core/types.js";

export const CLEAR_RANGE_M = 5;

/**
 * Ranges with every listed beam blocked and every other beam clear.
 */
export function rangesWithBlocked(beams: Iterable<number>): number[] {
  const ranges = new Array<number>(BEAM_COUNT).fill(CLEAR_RANGE_M);
  for (const b of beams) ranges[b] = Infinity;
  return ranges;
}

/**
 * Inclusive beam list for [start, end], wrapping past 359 when end < start.
 */
export function arc(start: number, end: number): number[] {
  const beams: number[] = [];
  for (let k = 0; k < segmentWidth(start, end); k++) {
    beams.push((start + k) % BEAM_COUNT);
  }
  return beams;
}

export function blockedFrame(timestep: number, ...arcs: Array<[number, number]>): ScanFrame {
  return createScanFrame(timestep, rangesWithBlocked(arcs.flatMap(([s, e]) => arc(s, e))));
}

export function clearFrame(timestep: number): ScanFrame {
  return createScanFrame(timestep, rangesWithBlocked([]));
}
