/**
 * Verilog ベンチマークスクリプトの構築
 * codegen の成果物に対して計測ツールを呼び出す実行可能スクリプトを生成する
 */

import type {
  CodegenInfo,
  FileHandle,
  FileWriteAction,
  OptIrInfo,
  Runfiles,
} from "../types/index.js";
import type { ActionContext } from "../actions/action-context.js";
import { mergeRunfiles } from "../actions/runfiles.js";
import { CommandLine } from "../codegen/command-line.js";
import { MissingTopError } from "../errors.js";
import type { ToolchainConfig } from "../toolchain/config.js";
import { getExecutableFrom, getRunfilesFrom } from "../toolchain/toolchain.js";

export interface BuildBenchmarkActionParams {
  ctx: ActionContext;
  /** 計測対象ターゲット名（エラーメッセージ用） */
  verilogTarget: string;
  codegenInfo: CodegenInfo;
  optIrInfo: OptIrInfo;
  toolchain: ToolchainConfig;
}

export interface BenchmarkActionResult {
  action: FileWriteAction;
  /** 生成したスクリプト */
  executable: FileHandle;
  runfiles: Runfiles;
}

/**
 * 計測コマンドを組み立てる
 * delay_model / pipeline_stages / clock_period_ps は値がある場合のみ付与
 */
export function buildBenchmarkCommand(
  tool: FileHandle,
  top: string,
  codegenInfo: CodegenInfo,
  optIrInfo: OptIrInfo
): CommandLine {
  return new CommandLine()
    .addArg(tool.short_path)
    .addArg(optIrInfo.opt_ir_file.short_path)
    .addArg(codegenInfo.block_ir_file.short_path)
    .addArg(codegenInfo.verilog_file.short_path)
    .addFlag("top", top)
    .addOptionalFlag("delay_model", codegenInfo.delay_model)
    .addOptionalFlag("pipeline_stages", codegenInfo.pipeline_stages)
    .addOptionalFlag("clock_period_ps", codegenInfo.clock_period_ps);
}

/**
 * スクリプト本文
 */
export function renderBenchmarkScript(command: string): string {
  return ["#!/usr/bin/env bash", "set -e", command, "exit 0"].join("\n");
}

/**
 * ベンチマークスクリプトのアクションを構築して登録する
 * @throws MissingTopError - codegenInfo に top がない場合（何も宣言・登録しない）
 * @throws ToolResolutionError - 計測ツールを解決できない場合
 */
export function buildBenchmarkAction(
  params: BuildBenchmarkActionParams
): BenchmarkActionResult {
  const { ctx, codegenInfo, optIrInfo, toolchain } = params;

  const top = codegenInfo.top;
  if (!top) {
    throw new MissingTopError(params.verilogTarget);
  }

  const benchmarkTool = getExecutableFrom(toolchain, "benchmark_codegen_tool");
  const benchmarkToolRunfiles = getRunfilesFrom(toolchain, "benchmark_codegen_tool");

  const command = buildBenchmarkCommand(benchmarkTool, top, codegenInfo, optIrInfo);
  const executable = ctx.declareFile(`${ctx.name}.sh`);

  const runfiles = mergeRunfiles(
    [benchmarkToolRunfiles],
    [optIrInfo.opt_ir_file, codegenInfo.block_ir_file, codegenInfo.verilog_file]
  );

  const action = ctx.write({
    output: executable,
    content: renderBenchmarkScript(command.toString()),
    isExecutable: true,
  });

  return { action, executable, runfiles };
}
