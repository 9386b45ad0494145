import { describe, it, expect } from "vitest";
import {
  createSeededRandom,
  generateSyntheticScan,
  generateSyntheticSequence
} from "../core/scan/synthetic.js";
import { extractSegments } from "../core/scan/extract.js";
import { DEFAULT_ENGINE_CONFIG } from "../core/validate.js";

function blockedBeams(ranges: readonly number[]): number[] {
  return ranges.flatMap((r, i) => (r === Infinity ? [i] : []));
}

describe("createSeededRandom", () => {
  it("repeats for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    for (let i = 0; i < 5; i++) expect(a()).toBe(b());
  });

  it("stays within [0, 1)", () => {
    const rng = createSeededRandom(3);
    for (let i = 0; i < 100; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("generateSyntheticScan", () => {
  it("blocks exactly the configured arcs", () => {
    const frame = generateSyntheticScan(1, {
      blocked_arcs: [{ start_beam: 358, end_beam: 1 }, { start_beam: 15, end_beam: 17 }],
      seed: 5
    });

    expect(frame.timestep).toBe(1);
    expect(blockedBeams(frame.ranges)).toEqual([0, 1, 15, 16, 17, 358, 359]);
  });

  it("keeps clear readings within the noise band", () => {
    const frame = generateSyntheticScan(1, { base_range_m: 8, noise_m: 0.5, seed: 9 });
    for (const r of frame.ranges) {
      expect(r).toBeGreaterThanOrEqual(7.5);
      expect(r).toBeLessThanOrEqual(8.5);
    }
  });
});

describe("generateSyntheticSequence", () => {
  it("numbers frames from the start timestep", () => {
    const frames = generateSyntheticSequence(3, {}, 10);
    expect(frames.map((f) => f.timestep)).toEqual([10, 11, 12]);
  });

  it("is reproducible from the seed", () => {
    const config = { transient_probability: 0.5, seed: 11 };
    expect(generateSyntheticSequence(20, config)).toEqual(generateSyntheticSequence(20, config));
  });

  it("always yields the persistent arc as a segment", () => {
    const frames = generateSyntheticSequence(20, {
      blocked_arcs: [{ start_beam: 100, end_beam: 119 }],
      transient_probability: 0.5,
      transient_max_beams: 4,
      seed: 2
    });

    for (const frame of frames) {
      const segments = extractSegments(frame, DEFAULT_ENGINE_CONFIG);
      expect(segments.some((s) => s.start_beam <= 100 && s.end_beam >= 119)).toBe(true);
    }
  });
});
