/**
 * 型定義のエクスポート
 */

// Common
export type { Label, CodegenArgs } from "./common.js";
export { formatLabel } from "./common.js";

// Artifact
export type {
  ArtifactRole,
  ArtifactDescriptor,
  FileRoot,
  FileHandle,
  Runfiles,
} from "./artifact.js";

// Action
export type { RunShellAction, FileWriteAction, BuildAction } from "./action.js";

// Provider
export type {
  GeneratorMode,
  ScheduleArtifact,
  CodegenInfo,
  OptIrInfo,
  DefaultInfo,
  TargetProviders,
} from "./provider.js";

// Build file
export type {
  BuildFile,
  Target,
  TargetKind,
  OutputOverrides,
  IrVerilogTarget,
  BenchmarkVerilogTarget,
  BuildFileValidationErrorCode,
  BuildFileValidationError,
  BuildFileValidationResult,
} from "./target.js";
