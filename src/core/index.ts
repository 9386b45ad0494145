export { OcclusionEngine, processFrames } from "./processor.js";
export type { OcclusionEngineOptions } from "./processor.js";
export {
  DEFAULT_ENGINE_CONFIG,
  createScanFrame,
  isValidReading,
  validateConfig,
  validateScanFrame
} from "./validate.js";
export {
  InvalidConfigurationError,
  MalformedFrameError,
  OcclusionEngineError,
  OutOfOrderFrameError,
  ValidationError
} from "./errors.js";
export {
  beamIndex,
  beamToDegrees,
  circularCenter,
  circularDistance,
  normalizeDegrees,
  segmentWidth,
  widthToDegrees,
  wraps
} from "./geometry/beam.js";
export {
  buildBlockedMask,
  extractSegments,
  findBlockedRuns,
  isBlockedReading,
  mergeRuns
} from "./scan/extract.js";
export { TrackedSegmentStore } from "./track/store.js";
export { matchFrame, rankCandidatePairs } from "./track/match.js";
export { classifyFrame, classifySegment, computeStability, isOcclusion } from "./classify.js";
export { createCollectorTracer, createTracer, mergeTracers, noopTracer } from "./trace.js";
export { BEAM_COUNT } from "./constants.js";
export type {
  BeamRange,
  ClassificationConfig,
  ClassifiedSegment,
  DegreeRange,
  EngineConfig,
  ExtractionConfig,
  FrameResult,
  MatchConfig,
  ScanFrame,
  Segment,
  TrackedSegment
} from "./types.js";
export type { BeamRun } from "./scan/extract.js";
export type { MatchResult, SegmentAssignment } from "./track/match.js";
export type { TraceContext, TraceEvent } from "./trace.js";
export {
  DEFAULT_SYNTHETIC_CONFIG,
  createSeededRandom,
  generateSyntheticScan,
  generateSyntheticSequence
} from "./scan/synthetic.js";
export type { BlockedArc, SyntheticScanConfig } from "./scan/synthetic.js";
