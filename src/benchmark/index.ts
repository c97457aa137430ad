/**
 * Benchmark モジュール
 */

export {
  buildBenchmarkAction,
  buildBenchmarkCommand,
  renderBenchmarkScript,
} from "./benchmark-action.js";
export type { BuildBenchmarkActionParams, BenchmarkActionResult } from "./benchmark-action.js";
