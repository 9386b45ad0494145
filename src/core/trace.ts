/**
 * Lightweight tracing infrastructure for debugging frame processing.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.log);
 *
 * // For production (no overhead):
 * const tracer = noopTracer;
 * ```
 */

import type { ClassifiedSegment, FrameResult, Segment, TrackedSegment } from "./types.js";

export interface TraceContext {
  /** Called when a frame passes validation and ordering checks */
  onFrameStart?(timestep: number, frameIndex: number): void;

  /** Called when candidate segments have been extracted */
  onSegmentsExtracted?(timestep: number, segments: readonly Segment[]): void;

  /** Called when a candidate continues an existing track */
  onTrackMatched?(timestep: number, trackId: number, segment: Segment, distance: number): void;

  /** Called when a candidate starts a new track */
  onTrackCreated?(timestep: number, trackId: number, segment: Segment): void;

  /** Called when a track has not been matched for a full window */
  onTrackEvicted?(timestep: number, track: TrackedSegment): void;

  /** Called for every candidate, reported or not */
  onSegmentClassified?(timestep: number, classified: ClassifiedSegment): void;

  /** Called when a frame is rejected before touching any state */
  onFrameRejected?(timestep: number | undefined, reason: string): void;

  /** Called when a frame result is emitted */
  onFrameComplete?(result: FrameResult): void;
}

/**
 * No-op tracer that has zero overhead when tracing is disabled.
 */
export const noopTracer: TraceContext = {};

function formatBeams(segment: Segment): string {
  return `${segment.start_beam}-${segment.end_beam}`;
}

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): TraceContext {
  return {
    onFrameStart(timestep, frameIndex) {
      log(`[TRACE] Frame ${frameIndex} (timestep ${timestep})`);
    },

    onSegmentsExtracted(timestep, segments) {
      const list = segments.map(formatBeams).join(", ");
      log(`[TRACE] ${timestep}: ${segments.length} candidate segment(s) [${list}]`);
    },

    onTrackMatched(timestep, trackId, segment, distance) {
      log(`[TRACE] ${timestep}: track #${trackId} matched ${formatBeams(segment)} (drift ${distance})`);
    },

    onTrackCreated(timestep, trackId, segment) {
      log(`[TRACE] ${timestep}: track #${trackId} created at ${formatBeams(segment)}`);
    },

    onTrackEvicted(timestep, track) {
      log(
        `[TRACE] ${timestep}: track #${track.id} evicted (last seen at timestep ${track.last_seen_timestep})`
      );
    },

    onSegmentClassified(timestep, classified) {
      const verdict = classified.is_occlusion ? "occlusion" : "transient";
      log(
        `[TRACE] ${timestep}: track #${classified.track_id} stability=${classified.stability.toFixed(2)}, width=${classified.width_deg.toFixed(1)}° -> ${verdict}`
      );
    },

    onFrameRejected(timestep, reason) {
      log(`[TRACE] ${timestep ?? "?"}: frame rejected - ${reason}`);
    },

    onFrameComplete(result) {
      log(
        `[TRACE] ${result.timestep}: complete - ${result.segments.length} occlusion(s)`
      );
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): {
  tracer: TraceContext;
  getEvents: () => TraceEvent[];
  clear: () => void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  const tracer: TraceContext = {
    onFrameStart(timestep, frameIndex) {
      addEvent("frame_start", { timestep, frameIndex });
    },

    onSegmentsExtracted(timestep, segments) {
      addEvent("segments_extracted", { timestep, count: segments.length });
    },

    onTrackMatched(timestep, trackId, segment, distance) {
      addEvent("track_matched", { timestep, trackId, segment, distance });
    },

    onTrackCreated(timestep, trackId, segment) {
      addEvent("track_created", { timestep, trackId, segment });
    },

    onTrackEvicted(timestep, track) {
      addEvent("track_evicted", { timestep, trackId: track.id });
    },

    onSegmentClassified(timestep, classified) {
      addEvent("segment_classified", {
        timestep,
        trackId: classified.track_id,
        stability: classified.stability,
        isOcclusion: classified.is_occlusion,
      });
    },

    onFrameRejected(timestep, reason) {
      addEvent("frame_rejected", { timestep, reason });
    },

    onFrameComplete(result) {
      addEvent("frame_complete", {
        timestep: result.timestep,
        hasOcclusion: result.has_occlusion,
        segmentCount: result.segments.length,
      });
    }
  };

  return {
    tracer,
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: TraceContext[]): TraceContext {
  return {
    onFrameStart(timestep, frameIndex) {
      for (const t of tracers) t.onFrameStart?.(timestep, frameIndex);
    },
    onSegmentsExtracted(timestep, segments) {
      for (const t of tracers) t.onSegmentsExtracted?.(timestep, segments);
    },
    onTrackMatched(timestep, trackId, segment, distance) {
      for (const t of tracers) t.onTrackMatched?.(timestep, trackId, segment, distance);
    },
    onTrackCreated(timestep, trackId, segment) {
      for (const t of tracers) t.onTrackCreated?.(timestep, trackId, segment);
    },
    onTrackEvicted(timestep, track) {
      for (const t of tracers) t.onTrackEvicted?.(timestep, track);
    },
    onSegmentClassified(timestep, classified) {
      for (const t of tracers) t.onSegmentClassified?.(timestep, classified);
    },
    onFrameRejected(timestep, reason) {
      for (const t of tracers) t.onFrameRejected?.(timestep, reason);
    },
    onFrameComplete(result) {
      for (const t of tracers) t.onFrameComplete?.(result);
    }
  };
}
