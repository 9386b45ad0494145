/**
 * Segment extraction: turn one frame's readings into blocked-beam segments.
 */

import type { ExtractionConfig, ScanFrame, Segment } from "../types.js";
import { BEAM_COUNT, EPS_MAX_RANGE } from "../constants.js";
import { beamIndex, circularCenter, wraps } from "../geometry/beam.js";

export interface BeamRun {
  start: number;
  length: number;
}

/**
 * A beam is blocked when its reading is the "no return" sentinel, or, with
 * `treat_ge_max_as_inf`, when it reaches `max_range`.
 */
export function isBlockedReading(
  range: number,
  config: Pick<ExtractionConfig, "treat_ge_max_as_inf" | "max_range">
): boolean {
  if (!Number.isFinite(range)) return true;
  return config.treat_ge_max_as_inf && range >= config.max_range - EPS_MAX_RANGE;
}

export function buildBlockedMask(
  frame: ScanFrame,
  config: Pick<ExtractionConfig, "treat_ge_max_as_inf" | "max_range">
): boolean[] {
  return frame.ranges.map((r) => isBlockedReading(r, config));
}

/**
 * Collect maximal runs of blocked beams, walking the ring once.
 *
 * The walk starts just after a clear beam, so a run crossing 359 -> 0 is
 * found as a single run. Runs are returned in walk order.
 */
export function findBlockedRuns(mask: readonly boolean[]): BeamRun[] {
  const firstClear = mask.indexOf(false);
  if (firstClear === -1) {
    return [{ start: 0, length: BEAM_COUNT }];
  }

  const runs: BeamRun[] = [];
  let runStart = 0;
  let length = 0;

  // k = BEAM_COUNT lands back on firstClear, closing any open run
  for (let k = 1; k <= BEAM_COUNT; k++) {
    const i = (firstClear + k) % BEAM_COUNT;
    if (mask[i]) {
      if (length === 0) runStart = i;
      length++;
    } else if (length > 0) {
      runs.push({ start: runStart, length });
      length = 0;
    }
  }

  return runs;
}

/**
 * Merge runs separated by at most `gapMergeBeams` clear beams.
 *
 * Gaps are measured around the ring, including the gap from the last run back
 * to the first. Merging is transitive. When every gap between two or more runs
 * qualifies, the whole ring collapses into one run.
 */
export function mergeRuns(runs: readonly BeamRun[], gapMergeBeams: number): BeamRun[] {
  const m = runs.length;
  if (m === 0) return [];
  if (m === 1) return [{ ...runs[0] }];

  const gaps = runs.map((run, i) => {
    const next = runs[(i + 1) % m];
    return beamIndex(next.start - (run.start + run.length));
  });

  const breakIdx = gaps.findIndex((g) => g > gapMergeBeams);
  if (breakIdx === -1) {
    return [{ start: 0, length: BEAM_COUNT }];
  }

  const merged: BeamRun[] = [];
  let i = (breakIdx + 1) % m;
  let current: BeamRun = { ...runs[i] };

  for (let step = 1; step < m; step++) {
    const prev = i;
    i = (i + 1) % m;
    if (gaps[prev] <= gapMergeBeams) {
      current.length += gaps[prev] + runs[i].length;
    } else {
      merged.push(current);
      current = { ...runs[i] };
    }
  }
  merged.push(current);

  return merged;
}

export function runToSegment(run: BeamRun): Segment {
  const end = beamIndex(run.start + run.length - 1);
  return {
    start_beam: run.start,
    end_beam: end,
    width_beams: run.length,
    center_beam: circularCenter(run.start, run.length),
    wraps: wraps(run.start, end),
  };
}

/**
 * Extract candidate segments from one frame.
 *
 * @returns Segments in ascending start beam, none narrower than `min_segment_beams`
 */
export function extractSegments(frame: ScanFrame, config: ExtractionConfig): Segment[] {
  const mask = buildBlockedMask(frame, config);
  const runs = mergeRuns(findBlockedRuns(mask), config.gap_merge_beams);

  return runs
    .filter((run) => run.length >= config.min_segment_beams)
    .map(runToSegment)
    .sort((a, b) => a.start_beam - b.start_beam);
}
