/**
 * CodegenInfo の組み立て
 */

import type {
  CodegenArgs,
  CodegenInfo,
  FileHandle,
  ScheduleArtifact,
} from "../types/index.js";

/**
 * codegen アクションが宣言したファイル
 */
export type CodegenFiles = {
  verilog_file: FileHandle;
  module_sig_file: FileHandle;
  verilog_line_map_file: FileHandle;
  block_ir_file: FileHandle;
} & ScheduleArtifact;

/**
 * top エンティティ名を解決する（module_name が優先）
 */
export function resolveTop(args: CodegenArgs): string | undefined {
  return args["module_name"] ?? args["top"];
}

/**
 * 宣言済みファイルと引数から CodegenInfo を生成する
 * 返り値は凍結されており、下流のターゲットと参照で共有される
 */
export function createCodegenInfo(
  files: CodegenFiles,
  args: CodegenArgs
): CodegenInfo {
  const top = resolveTop(args);
  const delayModel = args["delay_model"];
  const pipelineStages = args["pipeline_stages"];
  const clockPeriodPs = args["clock_period_ps"];

  return Object.freeze({
    ...files,
    ...(delayModel !== undefined && { delay_model: delayModel }),
    ...(top !== undefined && { top }),
    ...(pipelineStages !== undefined && { pipeline_stages: pipelineStages }),
    ...(clockPeriodPs !== undefined && { clock_period_ps: clockPeriodPs }),
  });
}
