/**
 * Codegen モジュール
 * 引数検証・成果物計画・アクション構築・CodegenInfo
 */

export {
  SYSTEM_VERILOG_FILE_EXTENSION,
  VERILOG_FILE_EXTENSION,
  ROLE_FILE_SUFFIXES,
  splitFilename,
  deriveFilename,
  stripRoleExtension,
} from "./filenames.js";
export type { VerilogExtension } from "./filenames.js";
export { CODEGEN_FLAGS, DEFAULT_CODEGEN_ARGS } from "./flags.js";
export {
  validateArgs,
  findUnknownArgs,
  isSystemVerilog,
  verilogExtensionFor,
  validateVerilogFilename,
} from "./validator.js";
export {
  ROLE_ATTRIBUTES,
  ARTIFACT_ROLE_ORDER,
  mergeWithDefaults,
  getGeneratorMode,
  planArtifacts,
} from "./planner.js";
export type { PlanArtifactsParams, CodegenPlan } from "./planner.js";
export { CommandLine } from "./command-line.js";
export type { CommandPart } from "./command-line.js";
export { OUTPUT_PATH_FLAGS, CODEGEN_MNEMONIC, buildCodegenAction } from "./codegen-action.js";
export type { BuildCodegenActionParams, CodegenActionResult } from "./codegen-action.js";
export { createCodegenInfo, resolveTop } from "./metadata.js";
export type { CodegenFiles } from "./metadata.js";
