/**
 * Core module exports for boxbench.
 */

export * from "./errors.ts";
export * from "./config.ts";
export * from "./config-loader.ts";
export * from "./dataset.ts";
export * from "./runner.ts";

export * from "./boxes/types.ts";
export * from "./boxes/batch.ts";
export * from "./boxes/geometry.ts";

export * from "./matching/area-filter.ts";
export * from "./matching/match-key.ts";
export * from "./matching/greedy-matcher.ts";
export * from "./matching/evaluate-image.ts";

export * from "./metrics/index.ts";
