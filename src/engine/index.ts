/**
 * Engine モジュール
 */

export { BuildPlanner } from "./build-planner.js";
export type {
  BuildPlannerOptions,
  AnalyzeOptions,
  AnalysisResult,
  TargetFailure,
  PlanCodegenParams,
} from "./build-planner.js";

export { analyzeIrVerilog } from "./use-cases/analyze-ir-verilog.js";
export { analyzeBenchmarkVerilog } from "./use-cases/analyze-benchmark-verilog.js";
export { materialize } from "./use-cases/materialize.js";
export { toAnalysisJson } from "./serialize.js";
export type { AnalysisJson } from "./serialize.js";
