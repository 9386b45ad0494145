import { describe, it, expect } from "vitest";
import {
  beamIndex,
  beamToDegrees,
  circularCenter,
  circularDistance,
  normalizeDegrees,
  segmentWidth,
  widthToDegrees,
  wraps,
} from "../core/geometry/beam.js";

describe("normalizeDegrees", () => {
  it("keeps angles already in [-180, 180)", () => {
    expect(normalizeDegrees(-180)).toBe(-180);
    expect(normalizeDegrees(0)).toBe(0);
    expect(normalizeDegrees(179.5)).toBe(179.5);
  });

  it("maps 180 to -180", () => {
    expect(normalizeDegrees(180)).toBe(-180);
  });

  it("wraps angles beyond one turn", () => {
    expect(normalizeDegrees(370)).toBe(10);
    expect(normalizeDegrees(-190)).toBe(170);
  });
});

describe("beamToDegrees", () => {
  it("maps beams linearly from angle_min", () => {
    expect(beamToDegrees(0, -180, 360)).toBe(-180);
    expect(beamToDegrees(15, -180, 360)).toBe(-165);
    expect(beamToDegrees(30, -180, 360)).toBe(-150);
  });

  it("normalizes past the +180 boundary", () => {
    expect(beamToDegrees(355, -180, 360)).toBe(175);
    expect(beamToDegrees(359, 0, 360)).toBe(-1);
  });

  it("scales by the angular span", () => {
    expect(beamToDegrees(180, 0, 180)).toBe(90);
  });
});

describe("circularDistance", () => {
  it("returns the plain difference for nearby beams", () => {
    expect(circularDistance(10, 13)).toBe(3);
    expect(circularDistance(13, 10)).toBe(3);
  });

  it("measures across the 0/359 boundary", () => {
    expect(circularDistance(358, 1)).toBe(3);
    expect(circularDistance(0, 359)).toBe(1);
  });

  it("never exceeds half a turn", () => {
    expect(circularDistance(0, 180)).toBe(180);
    expect(circularDistance(0, 181)).toBe(179);
  });
});

describe("segment helpers", () => {
  it("detects wrapping segments", () => {
    expect(wraps(358, 1)).toBe(true);
    expect(wraps(15, 30)).toBe(false);
    expect(wraps(5, 5)).toBe(false);
  });

  it("counts width across the boundary", () => {
    expect(segmentWidth(15, 30)).toBe(16);
    expect(segmentWidth(358, 1)).toBe(4);
    expect(segmentWidth(0, 359)).toBe(360);
  });

  it("computes the circular center", () => {
    expect(circularCenter(15, 16)).toBe(22);
    expect(circularCenter(358, 4)).toBe(359);
    expect(circularCenter(355, 10)).toBe(359);
  });

  it("wraps indices onto the ring", () => {
    expect(beamIndex(360)).toBe(0);
    expect(beamIndex(-1)).toBe(359);
  });

  it("converts width to degrees", () => {
    expect(widthToDegrees(16, 360)).toBe(16);
    expect(widthToDegrees(10, 180)).toBe(5);
  });
});
