export * from "./core/index.js";
export * from "./io/csv.js";
export * from "./pipelines/occlusionFromCsv.js";
