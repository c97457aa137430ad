/**
 * Provider（ターゲット間で受け渡すメタデータ）の型定義
 *
 * Provider は解析時に一度だけ生成され、参照で共有される。
 * 生成後は変更しない（Object.freeze で凍結）
 */

import type { FileHandle, Runfiles } from "./artifact.js";

/**
 * 生成器モード
 * - combinational: schedule を生成しない
 * - pipeline: generator 未指定または "pipeline"
 * - other: それ以外の generator 値
 */
export type GeneratorMode = "combinational" | "pipeline" | "other";

/**
 * schedule 成果物の有無を生成器モードで判別する
 */
export type ScheduleArtifact =
  | { generator_mode: "combinational"; schedule_file: null }
  | { generator_mode: "pipeline" | "other"; schedule_file: FileHandle };

/**
 * codegen の成果物と主要な設定値
 *
 * @law generator_mode = "combinational" ⇔ schedule_file = null
 * @law top = codegen_args.module_name ?? codegen_args.top
 */
export type CodegenInfo = Readonly<
  {
    verilog_file: FileHandle;
    module_sig_file: FileHandle;
    verilog_line_map_file: FileHandle;
    block_ir_file: FileHandle;
    delay_model?: string;
    top?: string;
    pipeline_stages?: string;
    clock_period_ps?: string;
  } & ScheduleArtifact
>;

/**
 * 最適化済み IR
 */
export type OptIrInfo = Readonly<{
  opt_ir_file: FileHandle;
}>;

/**
 * ターゲットの既定出力
 */
export type DefaultInfo = Readonly<{
  /** 直接生成したファイル + 依存ターゲットの生成ファイル */
  files: readonly FileHandle[];
  runfiles: Runfiles;
  executable?: FileHandle;
}>;

/**
 * ターゲットが提供する Provider 一式
 */
export interface TargetProviders {
  default_info: DefaultInfo;
  codegen_info?: CodegenInfo;
  opt_ir_info?: OptIrInfo;
}
