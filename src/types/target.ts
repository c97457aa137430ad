/**
 * ビルドファイル（ターゲット定義）の型定義
 *
 * ## 一意性 Law（不変条件）
 *
 * - `unique(targets[].name)` - ターゲット名はパッケージ内で重複禁止
 *
 * ## パス Law（不変条件）
 *
 * - `package` は正規形の相対パス（"." / ".." / 空要素なし、絶対パス不可）
 * - `targets[].name` はドットのみの名前を含まない
 *
 * ## 参照整合性 Law（不変条件）
 *
 * - `∀b ∈ benchmark_verilog: b.verilog_target ∈ targets[].name`
 * - `∀b ∈ benchmark_verilog: kind(b.verilog_target) = "ir_verilog"`
 *
 * @grounding validateBuildFile() 関数で検証
 */

import type { CodegenArgs } from "./common.js";

export interface BuildFile {
  /** ワークスペースルートからのパッケージパス */
  package: string;
  targets: Target[];
}

export type Target = IrVerilogTarget | BenchmarkVerilogTarget;

export type TargetKind = Target["kind"];

/**
 * 出力ファイル名の明示指定
 * 未指定の役割は Verilog ファイルのベース名から導出する
 */
export interface OutputOverrides {
  module_sig_file?: string;
  schedule_file?: string;
  verilog_line_map_file?: string;
  block_ir_file?: string;
}

/**
 * IR から Verilog を生成するターゲット
 */
export interface IrVerilogTarget extends OutputOverrides {
  kind: "ir_verilog";
  name: string;
  /** 入力 IR（パッケージ相対） */
  src: string;
  /**
   * 生成する Verilog ファイル名
   * @law 拡張子は use_system_verilog に応じて sv または v
   */
  verilog_file: string;
  codegen_args: CodegenArgs;
}

/**
 * 生成済み Verilog を計測するスクリプトを作るターゲット
 */
export interface BenchmarkVerilogTarget {
  kind: "benchmark_verilog";
  name: string;
  /** 同一パッケージの ir_verilog ターゲット名 */
  verilog_target: string;
}

/**
 * ビルドファイル検証エラーのコード
 */
export type BuildFileValidationErrorCode =
  | "INVALID_PACKAGE"
  | "DUPLICATE_TARGET_NAME"
  | "INVALID_TARGET_NAME"
  | "UNKNOWN_VERILOG_TARGET"
  | "INVALID_VERILOG_TARGET_KIND";

export interface BuildFileValidationError {
  code: BuildFileValidationErrorCode;
  message: string;
  /** JSON Pointer 形式の位置 */
  path?: string;
}

export interface BuildFileValidationResult {
  valid: boolean;
  errors: BuildFileValidationError[];
}
