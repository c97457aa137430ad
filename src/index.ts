/**
 * hdl-build-rules - IR から Verilog を生成するビルドルールのプランナー
 * @module hdl-build-rules
 */

// Types
export * from "./types/index.js";

// Errors
export {
  BuildRuleError,
  UnknownOptionError,
  BadExtensionError,
  MissingTopError,
  ToolResolutionError,
  MissingOutputError,
  UnproducedOutputError,
  DuplicateOutputError,
  ActionConflictError,
} from "./errors.js";
export type { BuildRuleErrorCode, BuildRuleErrorDetails } from "./errors.js";

// Codegen
export {
  deriveFilename,
  splitFilename,
  stripRoleExtension,
  CODEGEN_FLAGS,
  DEFAULT_CODEGEN_ARGS,
  validateArgs,
  validateVerilogFilename,
  isSystemVerilog,
  planArtifacts,
  getGeneratorMode,
  CommandLine,
  buildCodegenAction,
  createCodegenInfo,
} from "./codegen/index.js";
export type { CodegenPlan, CodegenFiles } from "./codegen/index.js";

// Benchmark
export { buildBenchmarkAction, renderBenchmarkScript } from "./benchmark/index.js";

// Actions
export { ActionContext, ActionRegistry, ArtifactPathError } from "./actions/index.js";

// Toolchain
export {
  loadToolchainConfig,
  parseToolchainConfig,
  ToolchainConfigError,
  getExecutableFrom,
  getRunfilesFrom,
} from "./toolchain/index.js";
export type { ToolchainConfig, ToolDefinition } from "./toolchain/index.js";

// Build file
export { parseBuildFile, parseBuildFileFromPath, BuildFileParseError } from "./build/index.js";
export { validateBuildFile } from "./build/index.js";

// Engine
export { BuildPlanner, toAnalysisJson } from "./engine/index.js";
export type { AnalysisResult, AnalyzeOptions, TargetFailure } from "./engine/index.js";

// MCP
export { createMcpServer, startMcpServer } from "./mcp/index.js";
