/**
 * Stability scoring and occlusion classification.
 */

import type {
  ClassificationConfig,
  ClassifiedSegment,
  FrameResult,
  Segment,
} from "./types.js";
import type { SegmentAssignment } from "./track/match.js";
import type { TrackedSegmentStore } from "./track/store.js";
import { beamToDegrees, widthToDegrees } from "./geometry/beam.js";

/**
 * Fraction of the bounded recent window in which a track was observed.
 *
 * During warm-up the window is the number of frames processed so far.
 */
export function computeStability(
  matchCount: number,
  framesProcessed: number,
  historySize: number
): number {
  const window = Math.min(framesProcessed, historySize);
  if (window <= 0) return 0;
  return Math.min(Math.max(matchCount / window, 0), 1);
}

/**
 * A segment is an occlusion iff it is both stable and wide enough.
 */
export function isOcclusion(
  stability: number,
  widthDeg: number,
  config: Pick<ClassificationConfig, "persistence_threshold" | "min_occlusion_width_deg">
): boolean {
  return stability >= config.persistence_threshold && widthDeg >= config.min_occlusion_width_deg;
}

export function classifySegment(
  segment: Segment,
  trackId: number,
  stability: number,
  config: ClassificationConfig
): ClassifiedSegment {
  const widthDeg = widthToDegrees(segment.width_beams, config.angle_span_deg);
  return {
    track_id: trackId,
    // Literal start/end angles, even when the segment wraps
    angle_range_deg: {
      start: beamToDegrees(segment.start_beam, config.angle_min_deg, config.angle_span_deg),
      end: beamToDegrees(segment.end_beam, config.angle_min_deg, config.angle_span_deg),
    },
    beam_range: { start: segment.start_beam, end: segment.end_beam },
    width_deg: widthDeg,
    stability,
    is_occlusion: isOcclusion(stability, widthDeg, config),
  };
}

/**
 * Classify every candidate of the current frame through the track it was
 * assigned to.
 *
 * @returns All classifications (reported or not) and the frame's result,
 *   which keeps only the reported occlusions
 */
export function classifyFrame(
  timestep: number,
  assignments: readonly SegmentAssignment[],
  store: TrackedSegmentStore,
  config: ClassificationConfig
): { classified: ClassifiedSegment[]; result: FrameResult } {
  const classified = assignments.map((a) =>
    classifySegment(a.segment, a.track_id, store.stability(a.track_id), config)
  );

  const segments = classified.filter((c) => c.is_occlusion);

  return {
    classified,
    result: {
      timestep,
      has_occlusion: segments.length > 0,
      segments,
    },
  };
}
