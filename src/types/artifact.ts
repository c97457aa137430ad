/**
 * Artifact（成果物）の型定義
 *
 * ## Term（用語）の統一
 *
 * - `role`: codegen が生成する成果物の論理的な役割
 * - `filename`: パッケージ相対のファイル名（宣言前）
 * - `FileHandle`: 宣言済みのファイル（パス解決済み）
 */

/**
 * codegen 成果物の役割
 * schedule は combinational 生成器では生成されない
 */
export type ArtifactRole =
  | "verilog"
  | "module_signature"
  | "schedule"
  | "verilog_line_map"
  | "block_ir";

/**
 * 成果物記述子（役割とファイル名の組）
 */
export interface ArtifactDescriptor {
  role: ArtifactRole;
  filename: string;
}

/**
 * ファイルのルート
 * - source: ワークスペース内のソースファイル
 * - bin: アクションが生成するファイル
 */
export type FileRoot = "source" | "bin";

/**
 * アクションの入出力として扱うファイル
 */
export interface FileHandle {
  /** 実行ルートからのパス（bin の場合は bin ディレクトリを含む） */
  path: string;
  /** ルートを含まないパス（runfiles 内での参照用） */
  short_path: string;
  root: FileRoot;
}

/**
 * 実行時に必要なファイル集合
 * @law files は path で一意
 */
export interface Runfiles {
  files: FileHandle[];
}
