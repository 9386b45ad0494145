/**
 * Row codec for scan input and occlusion output.
 *
 * Input rows:  timestep,lidar_0,...,lidar_359
 * Output rows: timestep,has_occlusion,num_segments,angle_ranges_deg,beam_indices,stabilities
 */

import type { ClassifiedSegment, FrameResult, ScanFrame } from "../core/types.js";
import { MalformedFrameError, ValidationError } from "../core/errors.js";
import { validateScanFrame } from "../core/validate.js";
import {
  ANGLE_DECIMALS,
  BEAM_COUNT,
  SEGMENT_SEPARATOR,
  STABILITY_DECIMALS,
} from "../core/constants.js";

export const OUTPUT_HEADER = [
  "timestep",
  "has_occlusion",
  "num_segments",
  "angle_ranges_deg",
  "beam_indices",
  "stabilities",
] as const;

const RANGE_COLUMN_PREFIX = "lidar_";

const INFINITY_TOKENS = new Set(["inf", "+inf", "infinity", "+infinity"]);
const NEGATIVE_INFINITY_TOKENS = new Set(["-inf", "-infinity"]);

const INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/;

export interface CsvRow {
  /** 1-based line number in the document */
  line: number;
  fields: string[];
}

// ============================================================================
// CSV primitives
// ============================================================================

/**
 * Split one CSV line into fields. Handles double-quoted fields with `""` escapes.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);

  return fields;
}

export function encodeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvLine(fields: readonly string[]): string {
  return fields.map(encodeCsvField).join(",");
}

/**
 * Split a document into rows, skipping blank lines but keeping line numbers.
 */
export function parseCsvDocument(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    if (raw.trim().length === 0) return;
    rows.push({ line: i + 1, fields: parseCsvLine(raw) });
  });
  return rows;
}

// ============================================================================
// Scan input
// ============================================================================

/**
 * Locate the `lidar_<n>` columns and order them by their numeric suffix.
 *
 * @returns Column indices, beam 0 first
 * @throws ValidationError when the header does not name exactly 360 distinct
 *   numbered range columns
 */
export function detectRangeColumns(header: readonly string[]): number[] {
  const errors: string[] = [];
  const columns: Array<{ beam: number; index: number }> = [];
  const seen = new Set<number>();

  header.forEach((raw, index) => {
    const name = raw.trim();
    if (!name.startsWith(RANGE_COLUMN_PREFIX)) return;

    const suffix = name.slice(RANGE_COLUMN_PREFIX.length);
    if (!INTEGER_PATTERN.test(suffix)) {
      errors.push(`column "${name}" has no numeric beam suffix`);
      return;
    }
    const beam = Number(suffix);
    if (seen.has(beam)) {
      errors.push(`column "${name}" repeats beam ${beam}`);
      return;
    }
    seen.add(beam);
    columns.push({ beam, index });
  });

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  if (columns.length === 0) {
    throw new ValidationError([`No ${RANGE_COLUMN_PREFIX}* columns found in header`]);
  }
  if (columns.length !== BEAM_COUNT) {
    throw new ValidationError([
      `Expected ${BEAM_COUNT} ${RANGE_COLUMN_PREFIX}* columns, found ${columns.length}`,
    ]);
  }

  return columns.sort((a, b) => a.beam - b.beam).map((c) => c.index);
}

/**
 * Parse a range token: a decimal number or one of the infinity spellings
 * (case-insensitive).
 *
 * @returns undefined for anything else, including decimals too large to
 *   represent
 */
export function parseRangeToken(token: string): number | undefined {
  const s = token.trim().toLowerCase();
  if (INFINITY_TOKENS.has(s)) return Infinity;
  if (NEGATIVE_INFINITY_TOKENS.has(s)) return -Infinity;
  if (!DECIMAL_PATTERN.test(s)) return undefined;

  const value = Number(s);
  return Number.isFinite(value) ? value : undefined;
}

function parseTimestep(token: string): number | undefined {
  if (!INTEGER_PATTERN.test(token.replace(/^[+-]/, ""))) return undefined;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Build a validated frame from one input row.
 *
 * @param fieldCount Number of fields in the header; every row must match it
 * @throws MalformedFrameError carrying the row's line number
 */
export function parseScanRow(
  row: CsvRow,
  rangeColumns: readonly number[],
  fieldCount: number
): ScanFrame {
  const errors: string[] = [];

  const timestepToken = row.fields[0]?.trim() ?? "";
  const timestep = parseTimestep(timestepToken);
  if (timestep === undefined) {
    errors.push(`timestep "${timestepToken}" is not an integer`);
  }

  if (row.fields.length !== fieldCount) {
    errors.push(`expected ${fieldCount} fields, got ${row.fields.length}`);
    throw new MalformedFrameError(errors, timestep, row.line);
  }

  const ranges: number[] = [];
  for (const column of rangeColumns) {
    const token = row.fields[column];
    const value = token === undefined ? undefined : parseRangeToken(token);
    if (value === undefined) {
      errors.push(`column ${column}: "${token ?? ""}" is not a number or infinity`);
      continue;
    }
    ranges.push(value);
  }

  if (errors.length > 0) {
    throw new MalformedFrameError(errors, timestep, row.line);
  }

  return validateScanFrame({ timestep, ranges }, row.line);
}

export function scanHeader(): string[] {
  const header = ["timestep"];
  for (let i = 0; i < BEAM_COUNT; i++) header.push(`${RANGE_COLUMN_PREFIX}${i}`);
  return header;
}

function formatRange(value: number): string {
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  return String(value);
}

export function formatScanRow(frame: ScanFrame): string[] {
  return [String(frame.timestep), ...frame.ranges.map(formatRange)];
}

// ============================================================================
// Occlusion output
// ============================================================================

export function formatAngleRanges(segments: readonly ClassifiedSegment[]): string {
  return segments
    .map(
      (s) =>
        `${s.angle_range_deg.start.toFixed(ANGLE_DECIMALS)} to ${s.angle_range_deg.end.toFixed(ANGLE_DECIMALS)}`
    )
    .join(SEGMENT_SEPARATOR);
}

export function formatBeamRanges(segments: readonly ClassifiedSegment[]): string {
  return segments
    .map((s) => `${s.beam_range.start}-${s.beam_range.end}`)
    .join(SEGMENT_SEPARATOR);
}

export function formatStabilities(segments: readonly ClassifiedSegment[]): string {
  return segments.map((s) => s.stability.toFixed(STABILITY_DECIMALS)).join(SEGMENT_SEPARATOR);
}

/**
 * One output row per frame. Multi-valued fields are empty strings when the
 * frame reports no segments.
 */
export function formatFrameResultRow(result: FrameResult): string[] {
  return [
    String(result.timestep),
    result.has_occlusion ? "1" : "0",
    String(result.segments.length),
    formatAngleRanges(result.segments),
    formatBeamRanges(result.segments),
    formatStabilities(result.segments),
  ];
}

/**
 * Serialize frame results as a CSV document, header included.
 */
export function formatFrameResultsCsv(results: readonly FrameResult[]): string {
  const lines = [formatCsvLine(OUTPUT_HEADER), ...results.map((r) => formatCsvLine(formatFrameResultRow(r)))];
  return lines.join("\n") + "\n";
}

/**
 * Serialize scan frames as a CSV document, header included.
 */
export function formatScansCsv(frames: readonly ScanFrame[]): string {
  const lines = [formatCsvLine(scanHeader()), ...frames.map((f) => formatCsvLine(formatScanRow(f)))];
  return lines.join("\n") + "\n";
}
