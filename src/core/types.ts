/**
 * One sensor reading. Each range is a finite non-negative distance in meters
 * or `Infinity` for "no return".
 */
export interface ScanFrame {
  readonly timestep: number;
  readonly ranges: readonly number[];
}

/**
 * A contiguous circular run of blocked beams within one frame.
 * `end_beam` is inclusive and may be smaller than `start_beam` when the run
 * crosses the 359 -> 0 boundary.
 */
export interface Segment {
  readonly start_beam: number;
  readonly end_beam: number;
  readonly width_beams: number;
  readonly center_beam: number;
  readonly wraps: boolean;
}

/**
 * A segment lineage maintained across frames.
 */
export interface TrackedSegment {
  id: number;
  current_position: Segment;
  /** Frames within the last `history_size` frames in which this track was matched */
  match_count: number;
  last_seen_timestep: number;
  /** Engine frame sequence number of the last match (1-based) */
  last_seen_frame: number;
  first_seen_frame: number;
  /** Frames since first observed, capped at `history_size` */
  age_in_window: number;
}

export interface DegreeRange {
  start: number;
  end: number;
}

export interface BeamRange {
  start: number;
  end: number;
}

export interface ClassifiedSegment {
  track_id: number;
  angle_range_deg: DegreeRange;
  beam_range: BeamRange;
  width_deg: number;
  stability: number; // 0..1
  is_occlusion: boolean;
}

export interface FrameResult {
  timestep: number;
  has_occlusion: boolean;
  /** Reported occlusions only, ascending start beam */
  segments: ClassifiedSegment[];
}

export interface EngineConfig {
  /** Sliding window length, in frames */
  history_size: number;
  /** Segments narrower than this (after gap merging) are dropped */
  min_segment_beams: number;
  /** Clear gaps of at most this many beams are merged into the surrounding runs */
  gap_merge_beams: number;
  /** Maximum circular center movement for a candidate to continue a track */
  drift_tolerance_beams: number;
  /** Minimum stability for a track to be reported */
  persistence_threshold: number;
  min_occlusion_width_deg: number;
  /** Angle of beam 0 */
  angle_min_deg: number;
  /** Angular span covered by the 360 beams */
  angle_span_deg: number;
  /** Also treat readings at or above `max_range` as "no return" */
  treat_ge_max_as_inf: boolean;
  max_range: number;
}

export type ExtractionConfig = Pick<
  EngineConfig,
  "min_segment_beams" | "gap_merge_beams" | "treat_ge_max_as_inf" | "max_range"
>;

/** The window length lives on the store the matcher updates */
export type MatchConfig = Pick<EngineConfig, "drift_tolerance_beams">;

export type ClassificationConfig = Pick<
  EngineConfig,
  | "persistence_threshold"
  | "min_occlusion_width_deg"
  | "angle_min_deg"
  | "angle_span_deg"
>;
