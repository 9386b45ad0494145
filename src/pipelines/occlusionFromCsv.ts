/**
 * End-to-end pipeline: scan CSV → occlusion engine → annotated CSV
 *
 * This pipeline:
 * 1. Reads the header and locates the lidar_* columns
 * 2. Parses each row into a validated scan frame
 * 3. Feeds frames, in row order, through one engine instance
 * 4. Applies the caller's policy to malformed and out-of-order rows
 * 5. Formats one output row per processed frame and summarizes the run
 *
 * The pipeline works on in-memory text; reading and writing files is the CLI's job.
 */

import type { EngineConfig, FrameResult } from "../core/types.js";
import type { TraceContext } from "../core/trace.js";
import { OcclusionEngine } from "../core/processor.js";
import { MalformedFrameError, OutOfOrderFrameError, ValidationError } from "../core/errors.js";
import {
  detectRangeColumns,
  formatFrameResultsCsv,
  parseCsvDocument,
  parseScanRow,
} from "../io/csv.js";

// ============================================================================
// Types
// ============================================================================

/** What to do with a row the engine cannot process */
export type RowPolicy = "skip" | "abort";

export interface PipelineOptions {
  on_malformed: RowPolicy;
  on_out_of_order: RowPolicy;
  tracer?: TraceContext;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  on_malformed: "skip",
  on_out_of_order: "abort",
};

export interface SkippedRow {
  line: number;
  timestep?: number;
  reason: "malformed" | "out_of_order";
  message: string;
}

export interface PipelineSummary {
  rows_read: number;
  frames_processed: number;
  frames_with_occlusion: number;
  rows_skipped: SkippedRow[];
}

export interface PipelineResult {
  results: FrameResult[];
  output_csv: string;
  summary: PipelineSummary;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Run a scan CSV document through a fresh engine.
 *
 * @throws InvalidConfigurationError for a bad config
 * @throws ValidationError when the header is unusable
 * @throws MalformedFrameError / OutOfOrderFrameError when the matching policy is "abort"
 */
export function runOcclusionPipeline(
  csvText: string,
  config: Partial<EngineConfig> = {},
  options: Partial<PipelineOptions> = {}
): PipelineResult {
  const opts: PipelineOptions = {
    on_malformed: options.on_malformed ?? DEFAULT_PIPELINE_OPTIONS.on_malformed,
    on_out_of_order: options.on_out_of_order ?? DEFAULT_PIPELINE_OPTIONS.on_out_of_order,
    tracer: options.tracer,
  };
  const engine = new OcclusionEngine(config, { tracer: opts.tracer });

  const [header, ...rows] = parseCsvDocument(csvText);
  if (!header) {
    throw new ValidationError(["Input has no header row"]);
  }
  const rangeColumns = detectRangeColumns(header.fields);

  const results: FrameResult[] = [];
  const skipped: SkippedRow[] = [];

  for (const row of rows) {
    try {
      const frame = parseScanRow(row, rangeColumns, header.fields.length);
      results.push(engine.processFrame(frame));
    } catch (err) {
      if (err instanceof MalformedFrameError && opts.on_malformed === "skip") {
        skipped.push({
          line: row.line,
          timestep: err.timestep,
          reason: "malformed",
          message: err.message,
        });
        continue;
      }
      if (err instanceof OutOfOrderFrameError && opts.on_out_of_order === "skip") {
        skipped.push({
          line: row.line,
          timestep: err.timestep,
          reason: "out_of_order",
          message: err.message,
        });
        continue;
      }
      throw err;
    }
  }

  return {
    results,
    output_csv: formatFrameResultsCsv(results),
    summary: {
      rows_read: rows.length,
      frames_processed: results.length,
      frames_with_occlusion: results.filter((r) => r.has_occlusion).length,
      rows_skipped: skipped,
    },
  };
}
