/**
 * Command line flag parsing.
 */

import type { EngineConfig } from "../core/index.js";
import type { RowPolicy } from "../pipelines/occlusionFromCsv.js";

export function parseArgs(argv: string[]): Record<string,string> {
  const out: Record<string,string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const val = argv[i+1];
    if (!val || val.startsWith("--")) {
      out[key] = "true";
    } else {
      out[key] = val;
      i++;
    }
  }
  return out;
}

export function numberArg(args: Record<string, string>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const lowered = raw.trim().toLowerCase();
  if (lowered === "inf" || lowered === "infinity") return Infinity;
  return raw.trim().length > 0 ? Number(raw) : Number.NaN;
}

export function policyArg(args: Record<string, string>, key: string): RowPolicy | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  if (raw === "skip" || raw === "abort") return raw;
  throw new Error(`--${key} must be "skip" or "abort", got "${raw}"`);
}

/**
 * Map command line flags onto engine config overrides. Absent flags keep the
 * engine defaults; the engine validates whatever is given.
 */
export function configFromArgs(args: Record<string, string>): Partial<EngineConfig> {
  return {
    history_size: numberArg(args, "history-size"),
    min_segment_beams: numberArg(args, "min-segment-beams"),
    gap_merge_beams: numberArg(args, "gap-merge-beams"),
    drift_tolerance_beams: numberArg(args, "drift-tolerance-beams"),
    persistence_threshold: numberArg(args, "persistence-threshold"),
    min_occlusion_width_deg: numberArg(args, "min-occlusion-width-deg"),
    angle_min_deg: numberArg(args, "angle-min-deg"),
    angle_span_deg: numberArg(args, "angle-span-deg"),
    treat_ge_max_as_inf: args["treat-ge-max-as-inf"] === "true" ? true : undefined,
    max_range: numberArg(args, "max-range"),
  };
}
