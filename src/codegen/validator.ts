/**
 * codegen 引数と Verilog ファイル名のバリデーター
 */

import type { CodegenArgs } from "../types/index.js";
import { BadExtensionError, UnknownOptionError } from "../errors.js";
import { CODEGEN_FLAGS } from "./flags.js";
import {
  splitFilename,
  SYSTEM_VERILOG_FILE_EXTENSION,
  VERILOG_FILE_EXTENSION,
  type VerilogExtension,
} from "./filenames.js";

/**
 * 全キーが許可リストに含まれることを検証する
 *
 * キーは Object.keys の順に調べる。整数形式のキー（"5" など）は挿入順に関係なく
 * 昇順で先頭に、その他の文字列キーは挿入順に並ぶ
 *
 * @param args - 検証対象の引数
 * @param allowedKeys - 許可されたキー
 * @returns 入力そのもの
 * @throws UnknownOptionError - 最初に見つかった許可外のキー
 */
export function validateArgs<T extends CodegenArgs>(
  args: T,
  allowedKeys: ReadonlySet<string> = CODEGEN_FLAGS
): T {
  for (const key of Object.keys(args)) {
    if (!allowedKeys.has(key)) {
      throw new UnknownOptionError(key);
    }
  }
  return args;
}

/**
 * 許可外のキーをすべて返す（validateArgs と同じ順序）
 */
export function findUnknownArgs(
  args: CodegenArgs,
  allowedKeys: ReadonlySet<string> = CODEGEN_FLAGS
): string[] {
  return Object.keys(args).filter((key) => !allowedKeys.has(key));
}

/**
 * use_system_verilog が "true"（大文字小文字を区別しない）か
 */
export function isSystemVerilog(args: CodegenArgs): boolean {
  return (args["use_system_verilog"] ?? "").toLowerCase() === "true";
}

/**
 * モードに対応する Verilog 拡張子
 */
export function verilogExtensionFor(useSystemVerilog: boolean): VerilogExtension {
  return useSystemVerilog ? SYSTEM_VERILOG_FILE_EXTENSION : VERILOG_FILE_EXTENSION;
}

/**
 * Verilog ファイル名の拡張子を検証する
 * SystemVerilog なら sv、そうでなければ v と完全一致すること
 * @throws BadExtensionError - 拡張子が一致しない、または拡張子がない場合
 */
export function validateVerilogFilename(
  filename: string,
  useSystemVerilog: boolean
): void {
  const expected = verilogExtensionFor(useSystemVerilog);
  const [, extension] = splitFilename(filename);
  if (extension !== expected) {
    throw new BadExtensionError(filename, expected, useSystemVerilog);
  }
}
