/**
 * Temporal matching of a frame's candidate segments against the tracked history.
 */

import type { MatchConfig, Segment, TrackedSegment } from "../types.js";
import { circularDistance } from "../geometry/beam.js";
import type { TrackedSegmentStore } from "./store.js";

export interface SegmentAssignment {
  /** Index into the frame's candidate list */
  candidate_index: number;
  segment: Segment;
  track_id: number;
  /** True when the candidate started a new track */
  created: boolean;
  /** Center distance to the matched track; 0 for new tracks */
  distance: number;
}

export interface MatchResult {
  frame_index: number;
  /** One assignment per candidate, in candidate order */
  assignments: SegmentAssignment[];
  evicted: TrackedSegment[];
}

interface CandidatePair {
  candidateIndex: number;
  track: TrackedSegment;
  distance: number;
}

/**
 * Pairs within drift tolerance, nearest first. Equal distances prefer the
 * track with more matches, then the older track, then the earlier candidate.
 */
export function rankCandidatePairs(
  candidates: readonly Segment[],
  tracks: readonly TrackedSegment[],
  driftToleranceBeams: number
): CandidatePair[] {
  const pairs: CandidatePair[] = [];

  candidates.forEach((candidate, candidateIndex) => {
    for (const track of tracks) {
      const distance = circularDistance(candidate.center_beam, track.current_position.center_beam);
      if (distance <= driftToleranceBeams) {
        pairs.push({ candidateIndex, track, distance });
      }
    }
  });

  return pairs.sort(
    (a, b) =>
      a.distance - b.distance ||
      b.track.match_count - a.track.match_count ||
      a.track.id - b.track.id ||
      a.candidateIndex - b.candidateIndex
  );
}

/**
 * Match one frame's candidates into the store (greedy nearest-first), start new
 * tracks for unmatched candidates and evict tracks unseen for `history_size` frames.
 *
 * Mutates the store.
 */
export function matchFrame(
  candidates: readonly Segment[],
  store: TrackedSegmentStore,
  config: MatchConfig,
  timestep: number
): MatchResult {
  const frameIndex = store.beginFrame();
  const pairs = rankCandidatePairs(candidates, store.tracks(), config.drift_tolerance_beams);

  const assigned = new Map<number, { trackId: number; distance: number }>();
  const claimedTracks = new Set<number>();

  for (const pair of pairs) {
    if (assigned.has(pair.candidateIndex) || claimedTracks.has(pair.track.id)) continue;
    assigned.set(pair.candidateIndex, { trackId: pair.track.id, distance: pair.distance });
    claimedTracks.add(pair.track.id);
  }

  const assignments = candidates.map((segment, candidateIndex): SegmentAssignment => {
    const match = assigned.get(candidateIndex);
    if (match) {
      store.recordMatch(match.trackId, segment, timestep);
      return {
        candidate_index: candidateIndex,
        segment,
        track_id: match.trackId,
        created: false,
        distance: match.distance,
      };
    }

    const track = store.add(segment, timestep);
    return {
      candidate_index: candidateIndex,
      segment,
      track_id: track.id,
      created: true,
      distance: 0,
    };
  });

  const evicted = store.evictStale();

  return { frame_index: frameIndex, assignments, evicted };
}
