/**
 * ツールチェーンからの実行ファイル・runfiles の解決
 */

import type { FileHandle, Runfiles } from "../types/index.js";
import { ToolResolutionError } from "../errors.js";
import type { ToolchainConfig, ToolName } from "./config.js";

/**
 * ワークスペース内のソースファイルとして扱う
 */
function toSourceFile(filePath: string): FileHandle {
  return { path: filePath, short_path: filePath, root: "source" };
}

/**
 * ツールの実行ファイルを取得
 * @throws ToolResolutionError - 未設定または実行ファイルが空の場合
 */
export function getExecutableFrom(
  toolchain: ToolchainConfig,
  tool: ToolName
): FileHandle {
  const definition = toolchain[tool];
  if (!definition) {
    throw new ToolResolutionError(tool, "not configured in the toolchain");
  }
  if (definition.executable.trim() === "") {
    throw new ToolResolutionError(tool, "executable path is empty");
  }
  return toSourceFile(definition.executable);
}

/**
 * ツールの runfiles（実行ファイル自身を含む）を取得
 * @throws ToolResolutionError - 未設定または実行ファイルが空の場合
 */
export function getRunfilesFrom(
  toolchain: ToolchainConfig,
  tool: ToolName
): Runfiles {
  const executable = getExecutableFrom(toolchain, tool);
  const extra = (toolchain[tool]?.runfiles ?? []).map(toSourceFile);
  return { files: [executable, ...extra] };
}
