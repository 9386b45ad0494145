/**
 * Frame processor: the single entry point that owns one tracked-segment
 * history and turns an ordered stream of scan frames into frame results.
 *
 * Steps per frame:
 * 1. Validate the frame (malformed frames leave the history untouched)
 * 2. Check timestep ordering (out-of-order frames leave the history untouched)
 * 3. Extract candidate segments
 * 4. Match candidates against the history, evict stale tracks
 * 5. Classify and emit one FrameResult
 *
 * Independent input streams need independent engines.
 */

import type { EngineConfig, FrameResult, ScanFrame, TrackedSegment } from "./types.js";
import { MalformedFrameError, OutOfOrderFrameError } from "./errors.js";
import { validateConfig, validateScanFrame } from "./validate.js";
import { extractSegments } from "./scan/extract.js";
import { TrackedSegmentStore } from "./track/store.js";
import { matchFrame } from "./track/match.js";
import { classifyFrame } from "./classify.js";
import { noopTracer, type TraceContext } from "./trace.js";

export interface OcclusionEngineOptions {
  /** Optional tracer for debugging. Defaults to noopTracer. */
  tracer?: TraceContext;
}

export class OcclusionEngine {
  readonly config: Readonly<EngineConfig>;

  private readonly store: TrackedSegmentStore;
  private readonly tracer: TraceContext;
  private previousTimestep: number | undefined;

  /**
   * @throws InvalidConfigurationError when any knob is outside its domain
   */
  constructor(config: Partial<EngineConfig> = {}, options: OcclusionEngineOptions = {}) {
    this.config = validateConfig(config);
    this.store = new TrackedSegmentStore(this.config.history_size);
    this.tracer = options.tracer ?? noopTracer;
  }

  get framesProcessed(): number {
    return this.store.currentFrame;
  }

  get lastTimestep(): number | undefined {
    return this.previousTimestep;
  }

  /**
   * Process the next frame.
   *
   * @throws MalformedFrameError when the frame is not 360 valid readings
   * @throws OutOfOrderFrameError when the timestep does not increase
   */
  processFrame(input: ScanFrame): FrameResult {
    const frame = this.admit(input);
    const { timestep } = frame;

    this.tracer.onFrameStart?.(timestep, this.store.currentFrame + 1);

    const candidates = extractSegments(frame, this.config);
    this.tracer.onSegmentsExtracted?.(timestep, candidates);

    const match = matchFrame(candidates, this.store, this.config, timestep);
    for (const a of match.assignments) {
      if (a.created) {
        this.tracer.onTrackCreated?.(timestep, a.track_id, a.segment);
      } else {
        this.tracer.onTrackMatched?.(timestep, a.track_id, a.segment, a.distance);
      }
    }
    for (const track of match.evicted) {
      this.tracer.onTrackEvicted?.(timestep, track);
    }

    const { classified, result } = classifyFrame(timestep, match.assignments, this.store, this.config);
    for (const c of classified) {
      this.tracer.onSegmentClassified?.(timestep, c);
    }

    this.previousTimestep = timestep;
    this.tracer.onFrameComplete?.(result);
    return result;
  }

  /**
   * Current stability of a track; 0 once it has been evicted.
   */
  stabilityOf(trackId: number): number {
    return this.store.stability(trackId);
  }

  /** Snapshot of the live tracks, in creation order */
  trackedSegments(): TrackedSegment[] {
    return this.store.tracks().map((track) => ({ ...track }));
  }

  /**
   * Drop all history, e.g. before reading a new input source.
   */
  reset(): void {
    this.store.reset();
    this.previousTimestep = undefined;
  }

  private admit(input: ScanFrame): ScanFrame {
    let frame: ScanFrame;
    try {
      frame = validateScanFrame(input);
    } catch (err) {
      if (err instanceof MalformedFrameError) {
        this.tracer.onFrameRejected?.(err.timestep, err.message);
      }
      throw err;
    }

    if (this.previousTimestep !== undefined && frame.timestep <= this.previousTimestep) {
      const err = new OutOfOrderFrameError(frame.timestep, this.previousTimestep);
      this.tracer.onFrameRejected?.(frame.timestep, err.message);
      throw err;
    }

    return frame;
  }
}

/**
 * Run a whole ordered frame sequence through a fresh engine.
 */
export function processFrames(
  frames: Iterable<ScanFrame>,
  config: Partial<EngineConfig> = {},
  options: OcclusionEngineOptions = {}
): FrameResult[] {
  const engine = new OcclusionEngine(config, options);
  const results: FrameResult[] = [];
  for (const frame of frames) {
    results.push(engine.processFrame(frame));
  }
  return results;
}
