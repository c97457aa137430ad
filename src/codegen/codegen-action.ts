/**
 * codegen アクションの構築
 * 計画済みの成果物を宣言し、codegen ツールの呼び出しを1つ登録する
 */

import type {
  ArtifactRole,
  FileHandle,
  Runfiles,
  RunShellAction,
  ScheduleArtifact,
} from "../types/index.js";
import type { ActionContext } from "../actions/action-context.js";
import { mergeRunfiles } from "../actions/runfiles.js";
import type { ToolchainConfig } from "../toolchain/config.js";
import { getExecutableFrom, getRunfilesFrom } from "../toolchain/toolchain.js";
import { CommandLine } from "./command-line.js";
import type { CodegenFiles } from "./metadata.js";
import type { CodegenPlan } from "./planner.js";

/**
 * 役割ごとの出力パスフラグ（codegen ツールのインターフェース）
 */
export const OUTPUT_PATH_FLAGS = {
  verilog: "output_verilog_path",
  module_signature: "output_signature_path",
  schedule: "output_schedule_path",
  verilog_line_map: "output_verilog_line_map_path",
  block_ir: "output_block_ir_path",
} as const satisfies Record<ArtifactRole, string>;

export const CODEGEN_MNEMONIC = "Codegen";

export interface BuildCodegenActionParams {
  ctx: ActionContext;
  plan: CodegenPlan;
  /** 入力 IR */
  src: FileHandle;
  toolchain: ToolchainConfig;
}

export interface CodegenActionResult {
  files: CodegenFiles;
  action: RunShellAction;
  /** 宣言順の生成ファイル */
  builtFiles: FileHandle[];
  runfiles: Runfiles;
}

/**
 * codegen アクションを構築して登録する
 * @throws ToolResolutionError - codegen ツールを解決できない場合（何も宣言・登録しない）
 */
export function buildCodegenAction(
  params: BuildCodegenActionParams
): CodegenActionResult {
  const { ctx, plan, src, toolchain } = params;

  const codegenTool = getExecutableFrom(toolchain, "codegen_tool");
  const codegenToolRunfiles = getRunfilesFrom(toolchain, "codegen_tool");

  const declared = new Map<ArtifactRole, FileHandle>();
  const builtFiles: FileHandle[] = [];
  const command = new CommandLine()
    .addArg(codegenTool.path)
    .addArg(src.path)
    .addArgsAsFlags(plan.args);

  for (const descriptor of plan.descriptors) {
    const file = ctx.declareFile(descriptor.filename);
    declared.set(descriptor.role, file);
    builtFiles.push(file);
    command.addFlag(OUTPUT_PATH_FLAGS[descriptor.role], file.path);
  }

  const requireFile = (role: ArtifactRole): FileHandle => {
    const file = declared.get(role);
    if (!file) {
      throw new Error(`Planned artifacts do not include '${role}'`);
    }
    return file;
  };

  const schedule: ScheduleArtifact =
    plan.mode === "combinational"
      ? { generator_mode: "combinational", schedule_file: null }
      : { generator_mode: plan.mode, schedule_file: requireFile("schedule") };

  const files: CodegenFiles = {
    verilog_file: requireFile("verilog"),
    module_sig_file: requireFile("module_signature"),
    verilog_line_map_file: requireFile("verilog_line_map"),
    block_ir_file: requireFile("block_ir"),
    ...schedule,
  };

  const runfiles = mergeRunfiles([codegenToolRunfiles], [src]);

  const action = ctx.runShell({
    outputs: builtFiles,
    inputs: runfiles.files,
    tools: [codegenTool],
    command: command.toString(),
    mnemonic: CODEGEN_MNEMONIC,
    progressMessage: `Building Verilog file: ${files.verilog_file.path}`,
  });

  return { files, action, builtFiles, runfiles };
}
