import { describe, it, expect } from "vitest";
import { classifySegment, computeStability, isOcclusion } from "../core/classify.js";
import { runToSegment } from "../core/scan/extract.js";
import type { ClassificationConfig } from "../core/types.js";

const config: ClassificationConfig = {
  persistence_threshold: 0.7,
  min_occlusion_width_deg: 5.0,
  angle_min_deg: -180,
  angle_span_deg: 360,
};

describe("computeStability", () => {
  it("normalizes by frames processed during warm-up", () => {
    expect(computeStability(1, 1, 30)).toBe(1);
    expect(computeStability(3, 6, 30)).toBe(0.5);
  });

  it("normalizes by history size once the window is full", () => {
    expect(computeStability(21, 45, 30)).toBe(0.7);
    expect(computeStability(30, 45, 30)).toBe(1);
  });

  it("is zero before any frame and for no matches", () => {
    expect(computeStability(0, 0, 30)).toBe(0);
    expect(computeStability(0, 40, 30)).toBe(0);
  });
});

describe("isOcclusion", () => {
  it("accepts stability exactly at the threshold", () => {
    expect(isOcclusion(7 / 10, 16, config)).toBe(true);
  });

  it("rejects stability just below the threshold", () => {
    expect(isOcclusion(computeStability(69, 100, 100), 16, config)).toBe(false);
  });

  it("rejects narrow segments regardless of stability", () => {
    expect(isOcclusion(1, 4, config)).toBe(false);
    expect(isOcclusion(1, 5, config)).toBe(true);
  });
});

describe("classifySegment", () => {
  it("reports angles, beams and width", () => {
    const c = classifySegment(runToSegment({ start: 15, length: 16 }), 3, 1, config);

    expect(c).toEqual({
      track_id: 3,
      angle_range_deg: { start: -165, end: -150 },
      beam_range: { start: 15, end: 30 },
      width_deg: 16,
      stability: 1,
      is_occlusion: true,
    });
  });

  it("keeps literal angles for wrapping segments", () => {
    const c = classifySegment(runToSegment({ start: 355, length: 10 }), 1, 0.8, config);

    expect(c.angle_range_deg).toEqual({ start: 175, end: -176 });
    expect(c.beam_range).toEqual({ start: 355, end: 4 });
  });

  it("uses the angular span for width", () => {
    const halfSpan = { ...config, angle_span_deg: 180 };
    const c = classifySegment(runToSegment({ start: 0, length: 8 }), 1, 1, halfSpan);

    expect(c.width_deg).toBe(4);
    expect(c.is_occlusion).toBe(false);
  });
});
