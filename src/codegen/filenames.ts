/**
 * 成果物ファイル名の導出
 * Verilog ファイルのベース名と役割から既定のファイル名を決める
 */

import type { ArtifactRole } from "../types/index.js";

export const SYSTEM_VERILOG_FILE_EXTENSION = "sv";
export const VERILOG_FILE_EXTENSION = "v";

export type VerilogExtension =
  | typeof SYSTEM_VERILOG_FILE_EXTENSION
  | typeof VERILOG_FILE_EXTENSION;

/**
 * verilog 以外の役割の固定サフィックス
 */
export const ROLE_FILE_SUFFIXES = {
  module_signature: ".sig.textproto",
  schedule: ".schedule.textproto",
  verilog_line_map: ".verilog_line_map.textproto",
  block_ir: ".block.ir",
} as const satisfies Record<Exclude<ArtifactRole, "verilog">, string>;

/**
 * ファイル名を最後のドットで [ベース名, 拡張子] に分割する
 * 拡張子にドットは含まない。最後の要素にドットがなければ拡張子は空文字列
 */
export function splitFilename(filename: string): [string, string] {
  const dotIndex = filename.lastIndexOf(".");
  if (dotIndex === -1 || dotIndex < filename.lastIndexOf("/")) {
    return [filename, ""];
  }
  return [filename.slice(0, dotIndex), filename.slice(dotIndex + 1)];
}

/**
 * 役割の既定ファイル名を導出する
 * @param basename - Verilog ファイル名から拡張子を除いたもの
 * @param role - 成果物の役割
 * @param verilogExtension - verilog 役割の拡張子（既定: sv）
 */
export function deriveFilename(
  basename: string,
  role: ArtifactRole,
  verilogExtension: VerilogExtension = SYSTEM_VERILOG_FILE_EXTENSION
): string {
  if (role === "verilog") {
    return `${basename}.${verilogExtension}`;
  }
  return basename + ROLE_FILE_SUFFIXES[role];
}

/**
 * deriveFilename の逆。役割のサフィックスを取り除く
 * サフィックスが一致しなければ undefined
 */
export function stripRoleExtension(
  filename: string,
  role: ArtifactRole
): string | undefined {
  if (role === "verilog") {
    const [basename, extension] = splitFilename(filename);
    return extension === SYSTEM_VERILOG_FILE_EXTENSION ||
      extension === VERILOG_FILE_EXTENSION
      ? basename
      : undefined;
  }
  const suffix = ROLE_FILE_SUFFIXES[role];
  return filename.endsWith(suffix)
    ? filename.slice(0, filename.length - suffix.length)
    : undefined;
}
