import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  noopTracer,
  createTracer,
  createCollectorTracer,
  mergeTracers
} from "../core/trace.js";
import { OcclusionEngine } from "../core/processor.js";
import { runToSegment } from "../core/scan/extract.js";
import { blockedFrame, clearFrame } from "./helpers.js";

describe("noopTracer", () => {
  it("has no methods defined (zero overhead)", () => {
    assert.equal(Object.keys(noopTracer).length, 0);
  });

  it("can be called without error", () => {
    noopTracer.onFrameStart?.(1, 1);
    noopTracer.onSegmentsExtracted?.(1, []);
    noopTracer.onFrameRejected?.(undefined, "test");
  });
});

describe("createTracer", () => {
  it("logs every step of a frame", () => {
    const logs: string[] = [];
    const engine = new OcclusionEngine({ history_size: 5 }, { tracer: createTracer((m) => logs.push(m)) });

    engine.processFrame(blockedFrame(1, [15, 30]));

    assert.deepEqual(logs, [
      "[TRACE] Frame 1 (timestep 1)",
      "[TRACE] 1: 1 candidate segment(s) [15-30]",
      "[TRACE] 1: track #1 created at 15-30",
      "[TRACE] 1: track #1 stability=1.00, width=16.0° -> occlusion",
      "[TRACE] 1: complete - 1 occlusion(s)"
    ]);
  });

  it("logs matches with their drift", () => {
    const logs: string[] = [];
    const engine = new OcclusionEngine({ history_size: 5 }, { tracer: createTracer((m) => logs.push(m)) });

    engine.processFrame(blockedFrame(1, [15, 30]));
    logs.length = 0;
    engine.processFrame(blockedFrame(2, [16, 31]));

    assert.equal(logs[2], "[TRACE] 2: track #1 matched 16-31 (drift 1)");
  });

  it("logs evictions", () => {
    const logs: string[] = [];
    const engine = new OcclusionEngine({ history_size: 1 }, { tracer: createTracer((m) => logs.push(m)) });

    engine.processFrame(blockedFrame(1, [15, 30]));
    engine.processFrame(clearFrame(2));

    assert.ok(logs.includes("[TRACE] 2: track #1 evicted (last seen at timestep 1)"));
    assert.equal(logs[logs.length - 1], "[TRACE] 2: complete - 0 occlusion(s)");
  });

  it("logs rejected frames", () => {
    const logs: string[] = [];
    const engine = new OcclusionEngine({}, { tracer: createTracer((m) => logs.push(m)) });

    engine.processFrame(clearFrame(2));
    assert.throws(() => engine.processFrame(clearFrame(2)));

    assert.equal(
      logs[logs.length - 1],
      "[TRACE] 2: frame rejected - Frame timestep 2 is not greater than the previous timestep 2"
    );
  });

  it("marks narrow or unstable candidates as transient", () => {
    const logs: string[] = [];
    const tracer = createTracer((m) => logs.push(m));

    tracer.onSegmentClassified?.(4, {
      track_id: 2,
      angle_range_deg: { start: 0, end: 3 },
      beam_range: { start: 180, end: 183 },
      width_deg: 4,
      stability: 0.25,
      is_occlusion: false
    });

    assert.deepEqual(logs, ["[TRACE] 4: track #2 stability=0.25, width=4.0° -> transient"]);
  });

  it("logs an unknown timestep as ?", () => {
    const logs: string[] = [];
    createTracer((m) => logs.push(m)).onFrameRejected?.(undefined, "bad row");
    assert.deepEqual(logs, ["[TRACE] ?: frame rejected - bad row"]);
  });
});

describe("createCollectorTracer", () => {
  it("collects events in processing order", () => {
    const { tracer, getEvents } = createCollectorTracer();
    const engine = new OcclusionEngine({ history_size: 5 }, { tracer });

    engine.processFrame(blockedFrame(1, [15, 30]));

    const events = getEvents();
    assert.deepEqual(
      events.map((e) => e.type),
      ["frame_start", "segments_extracted", "track_created", "segment_classified", "frame_complete"]
    );
    assert.deepEqual(events[1].data, { timestep: 1, count: 1 });
    assert.deepEqual(events[3].data, { timestep: 1, trackId: 1, stability: 1, isOcclusion: true });
    assert.deepEqual(events[4].data, { timestep: 1, hasOcclusion: true, segmentCount: 1 });
  });

  it("records rejected frames without starting them", () => {
    const { tracer, getEvents } = createCollectorTracer();
    const engine = new OcclusionEngine({}, { tracer });

    assert.throws(() => engine.processFrame({ timestep: 3, ranges: [] }));

    const events = getEvents();
    assert.equal(events.length, 1);
    assert.equal(events[0].type, "frame_rejected");
    assert.equal(events[0].data.timestep, 3);
  });

  it("can be cleared", () => {
    const { tracer, getEvents, clear } = createCollectorTracer();
    tracer.onFrameStart?.(1, 1);
    clear();
    assert.equal(getEvents().length, 0);
  });
});

describe("mergeTracers", () => {
  it("forwards every event to every tracer", () => {
    const a = createCollectorTracer();
    const b = createCollectorTracer();
    const merged = mergeTracers(a.tracer, b.tracer);

    const segment = runToSegment({ start: 15, length: 16 });
    merged.onTrackCreated?.(1, 1, segment);
    merged.onTrackMatched?.(2, 1, segment, 0);

    assert.deepEqual(a.getEvents().map((e) => e.type), ["track_created", "track_matched"]);
    assert.deepEqual(b.getEvents().map((e) => e.type), ["track_created", "track_matched"]);
  });

  it("tolerates tracers with missing hooks", () => {
    const logs: string[] = [];
    const merged = mergeTracers(noopTracer, createTracer((m) => logs.push(m)));
    merged.onFrameStart?.(9, 3);
    assert.deepEqual(logs, ["[TRACE] Frame 3 (timestep 9)"]);
  });
});
