/**
 * 成果物プランナー
 * 既定値とユーザー指定の引数をマージし、宣言する成果物を決定する
 *
 * ## 純粋性 Law（不変条件）
 *
 * - descriptors は (Verilog ベース名, 生成器モード, 明示指定) のみで決まる
 * - 同じ入力からは常に同じ順序の descriptors を返す
 */

import type {
  ArtifactDescriptor,
  ArtifactRole,
  CodegenArgs,
  GeneratorMode,
  OutputOverrides,
} from "../types/index.js";
import { MissingOutputError, UnproducedOutputError } from "../errors.js";
import { DEFAULT_CODEGEN_ARGS } from "./flags.js";
import { deriveFilename, splitFilename } from "./filenames.js";
import { isSystemVerilog, validateArgs, validateVerilogFilename } from "./validator.js";

/**
 * 役割ごとのファイル名指定属性
 */
export const ROLE_ATTRIBUTES = {
  verilog: "verilog_file",
  module_signature: "module_sig_file",
  schedule: "schedule_file",
  verilog_line_map: "verilog_line_map_file",
  block_ir: "block_ir_file",
} as const satisfies Record<ArtifactRole, string>;

/**
 * descriptors の並び順
 */
export const ARTIFACT_ROLE_ORDER: readonly ArtifactRole[] = [
  "verilog",
  "module_signature",
  "schedule",
  "verilog_line_map",
  "block_ir",
];

export interface PlanArtifactsParams {
  codegenArgs: CodegenArgs;
  /** 生成する Verilog ファイル名（必須） */
  verilogFile: string;
  overrides?: OutputOverrides;
}

export interface CodegenPlan {
  /** 既定値をマージし検証済みの引数 */
  args: CodegenArgs;
  mode: GeneratorMode;
  useSystemVerilog: boolean;
  basename: string;
  descriptors: readonly ArtifactDescriptor[];
}

/**
 * 既定値の上にユーザー指定の引数を重ねた新しいオブジェクトを返す
 */
export function mergeWithDefaults(
  args: CodegenArgs,
  defaults: CodegenArgs = DEFAULT_CODEGEN_ARGS
): CodegenArgs {
  return Object.freeze({ ...defaults, ...args });
}

/**
 * generator 引数から生成器モードを決める
 */
export function getGeneratorMode(args: CodegenArgs): GeneratorMode {
  const generator = args["generator"];
  if (generator === "combinational") {
    return "combinational";
  }
  if (generator === undefined || generator === "pipeline") {
    return "pipeline";
  }
  return "other";
}

/**
 * 宣言する成果物を決定する
 * @throws MissingOutputError - verilogFile が空の場合
 * @throws UnknownOptionError - 許可外の引数がある場合
 * @throws BadExtensionError - Verilog ファイルの拡張子がモードと一致しない場合
 * @throws UnproducedOutputError - combinational で schedule_file が指定された場合
 */
export function planArtifacts(params: PlanArtifactsParams): CodegenPlan {
  const { verilogFile, overrides = {} } = params;
  if (!verilogFile) {
    throw new MissingOutputError(ROLE_ATTRIBUTES.verilog);
  }

  const args = validateArgs(mergeWithDefaults(params.codegenArgs));
  const useSystemVerilog = isSystemVerilog(args);
  validateVerilogFilename(verilogFile, useSystemVerilog);

  const mode = getGeneratorMode(args);
  const [basename] = splitFilename(verilogFile);

  if (mode === "combinational" && overrides.schedule_file !== undefined) {
    throw new UnproducedOutputError(
      ROLE_ATTRIBUTES.schedule,
      overrides.schedule_file,
      "the combinational generator does not emit a schedule"
    );
  }

  const descriptors = ARTIFACT_ROLE_ORDER.filter(
    (role) => role !== "schedule" || mode !== "combinational"
  ).map((role): ArtifactDescriptor => {
    if (role === "verilog") {
      return { role, filename: verilogFile };
    }
    const override = overrides[ROLE_ATTRIBUTES[role]];
    return { role, filename: override ?? deriveFilename(basename, role) };
  });

  return {
    args,
    mode,
    useSystemVerilog,
    basename,
    descriptors: Object.freeze(descriptors),
  };
}
