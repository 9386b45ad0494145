/**
 * Sliding-window history of tracked segments.
 *
 * Tracks are keyed by a stable integer id. Each track keeps the sequence
 * numbers of the frames it was matched in, trimmed to the last
 * `historySize` frames, so `match_count` is always the hit count inside the
 * active window.
 */

import type { Segment, TrackedSegment } from "../types.js";
import { computeStability } from "../classify.js";

interface TrackEntry {
  track: TrackedSegment;
  /** Frame sequence numbers of matches, oldest first */
  hits: number[];
}

export class TrackedSegmentStore {
  readonly historySize: number;

  private readonly entries = new Map<number, TrackEntry>();
  private frameIndex = 0;
  private nextId = 1;

  constructor(historySize: number) {
    this.historySize = historySize;
  }

  /** Sequence number of the current frame (0 before the first frame) */
  get currentFrame(): number {
    return this.frameIndex;
  }

  /** Frames used to normalize stability: min(frames processed, history size) */
  get windowFrames(): number {
    return Math.min(this.frameIndex, this.historySize);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Advance to the next frame and slide every track's window.
   *
   * @returns The new frame sequence number
   */
  beginFrame(): number {
    this.frameIndex++;
    const oldest = this.frameIndex - this.historySize;

    for (const entry of this.entries.values()) {
      while (entry.hits.length > 0 && entry.hits[0] <= oldest) {
        entry.hits.shift();
      }
      entry.track.match_count = entry.hits.length;
      entry.track.age_in_window = Math.min(
        this.frameIndex - entry.track.first_seen_frame + 1,
        this.historySize
      );
    }

    return this.frameIndex;
  }

  add(segment: Segment, timestep: number): TrackedSegment {
    const id = this.nextId++;
    const track: TrackedSegment = {
      id,
      current_position: segment,
      match_count: 1,
      last_seen_timestep: timestep,
      last_seen_frame: this.frameIndex,
      first_seen_frame: this.frameIndex,
      age_in_window: 1,
    };
    this.entries.set(id, { track, hits: [this.frameIndex] });
    return track;
  }

  recordMatch(id: number, segment: Segment, timestep: number): TrackedSegment {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new Error(`Unknown tracked segment ${id}`);
    }

    if (entry.hits[entry.hits.length - 1] !== this.frameIndex) {
      entry.hits.push(this.frameIndex);
    }
    entry.track.current_position = segment;
    entry.track.match_count = Math.min(entry.hits.length, this.historySize);
    entry.track.last_seen_timestep = timestep;
    entry.track.last_seen_frame = this.frameIndex;
    return entry.track;
  }

  /**
   * Remove tracks not matched in the most recent `historySize` frames.
   */
  evictStale(): TrackedSegment[] {
    const evicted: TrackedSegment[] = [];
    for (const [id, entry] of this.entries) {
      if (this.frameIndex - entry.track.last_seen_frame >= this.historySize) {
        this.entries.delete(id);
        evicted.push(entry.track);
      }
    }
    return evicted;
  }

  get(id: number): TrackedSegment | undefined {
    return this.entries.get(id)?.track;
  }

  /** Live tracks in creation order */
  tracks(): TrackedSegment[] {
    return [...this.entries.values()].map((entry) => entry.track);
  }

  /**
   * Fraction of the current window in which the track was matched; 0 for
   * unknown or evicted tracks.
   */
  stability(id: number): number {
    const track = this.get(id);
    if (!track) return 0;
    return computeStability(track.match_count, this.frameIndex, this.historySize);
  }

  reset(): void {
    this.entries.clear();
    this.frameIndex = 0;
    this.nextId = 1;
  }
}
