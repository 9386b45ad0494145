/**
 * Synthetic scan generation for exercising the occlusion engine.
 */

import type { ScanFrame } from "../types.js";
import { BEAM_COUNT } from "../constants.js";
import { beamIndex, segmentWidth } from "../geometry/beam.js";
import { createScanFrame } from "../validate.js";

export interface BlockedArc {
  start_beam: number;
  /** Inclusive; may be smaller than start_beam to wrap past 359 */
  end_beam: number;
}

export interface SyntheticScanConfig {
  /** Arcs blocked in every generated frame */
  blocked_arcs: BlockedArc[];
  /** Mean distance of clear readings (m) */
  base_range_m: number;
  /** Uniform noise amplitude on clear readings (m) */
  noise_m: number;
  /** Per-frame probability of one transient dropout arc */
  transient_probability: number;
  /** Upper bound on the width of a transient arc */
  transient_max_beams: number;
  /** Random seed for reproducibility */
  seed?: number;
}

export const DEFAULT_SYNTHETIC_CONFIG: SyntheticScanConfig = {
  blocked_arcs: [],
  base_range_m: 5,
  noise_m: 0.1,
  transient_probability: 0,
  transient_max_beams: 8,
};

/**
 * Simple seeded random number generator (Linear Congruential Generator).
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function blockArc(ranges: number[], arc: BlockedArc): void {
  const width = segmentWidth(arc.start_beam, arc.end_beam);
  for (let k = 0; k < width; k++) {
    ranges[beamIndex(arc.start_beam + k)] = Infinity;
  }
}

function generateRanges(cfg: SyntheticScanConfig, rng: () => number): number[] {
  const ranges: number[] = [];
  for (let i = 0; i < BEAM_COUNT; i++) {
    const noise = (rng() * 2 - 1) * cfg.noise_m;
    ranges.push(Math.max(0, cfg.base_range_m + noise));
  }

  for (const arc of cfg.blocked_arcs) {
    blockArc(ranges, arc);
  }

  if (rng() < cfg.transient_probability) {
    const start = Math.floor(rng() * BEAM_COUNT);
    const width = 1 + Math.floor(rng() * cfg.transient_max_beams);
    blockArc(ranges, { start_beam: start, end_beam: beamIndex(start + width - 1) });
  }

  return ranges;
}

/**
 * Generate one synthetic scan frame.
 */
export function generateSyntheticScan(
  timestep: number,
  config: Partial<SyntheticScanConfig> = {}
): ScanFrame {
  const cfg = { ...DEFAULT_SYNTHETIC_CONFIG, ...config };
  const rng = cfg.seed !== undefined ? createSeededRandom(cfg.seed) : Math.random;
  return createScanFrame(timestep, generateRanges(cfg, rng));
}

/**
 * Generate `count` frames with consecutive timesteps, sharing one random
 * stream so the whole sequence is reproducible from a single seed.
 */
export function generateSyntheticSequence(
  count: number,
  config: Partial<SyntheticScanConfig> = {},
  startTimestep = 1
): ScanFrame[] {
  const cfg = { ...DEFAULT_SYNTHETIC_CONFIG, ...config };
  const rng = createSeededRandom(cfg.seed ?? 1);

  const frames: ScanFrame[] = [];
  for (let i = 0; i < count; i++) {
    frames.push(createScanFrame(startTimestep + i, generateRanges(cfg, rng)));
  }
  return frames;
}
