#!/usr/bin/env node
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { createTracer } from "../core/index.js";
import { runOcclusionPipeline } from "../pipelines/occlusionFromCsv.js";
import { configFromArgs, parseArgs, policyArg } from "./args.js";

const USAGE = `Usage: tsx src/cli/index.ts --input <scans.csv> --output <occlusions.csv>
  [--history-size <n>] [--min-segment-beams <n>] [--gap-merge-beams <n>]
  [--drift-tolerance-beams <n>] [--persistence-threshold <0..1>]
  [--min-occlusion-width-deg <deg>] [--angle-min-deg <deg>] [--angle-span-deg <deg>]
  [--treat-ge-max-as-inf] [--max-range <m>]
  [--on-malformed skip|abort] [--on-out-of-order skip|abort] [--trace]`;

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const inputPath = args["input"];
  const outputPath = args["output"];

  if (!inputPath || !outputPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const csvText = await readFile(inputPath, "utf8");

  const result = runOcclusionPipeline(csvText, configFromArgs(args), {
    on_malformed: policyArg(args, "on-malformed"),
    on_out_of_order: policyArg(args, "on-out-of-order"),
    tracer: args["trace"] === "true" ? createTracer(console.log) : undefined,
  });

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, result.output_csv, "utf8");

  const { summary } = result;
  console.log(`Rows read:            ${summary.rows_read}`);
  console.log(`Frames processed:     ${summary.frames_processed}`);
  console.log(`Frames with occlusion: ${summary.frames_with_occlusion}`);
  for (const skipped of summary.rows_skipped) {
    console.log(`Skipped line ${skipped.line} (${skipped.reason}): ${skipped.message}`);
  }
  console.log(`Wrote ${outputPath}`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
