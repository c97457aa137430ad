/**
 * Toolchain config helpers
 */

import * as fs from "node:fs/promises";
import { z } from "zod";

export const DEFAULT_TOOLCHAIN_CONFIG_PATH = ".hdl_rules/toolchain.json";

/**
 * ツールの定義
 */
export interface ToolDefinition {
  /** 実行ファイル（ワークスペースルート相対） */
  executable: string;
  /** 実行時に必要なファイル（ワークスペースルート相対） */
  runfiles?: string[];
}

/**
 * ツールチェーン設定
 * 未設定のツールは使用時に ToolResolutionError になる
 */
export interface ToolchainConfig {
  codegen_tool?: ToolDefinition;
  benchmark_codegen_tool?: ToolDefinition;
}

export type ToolName = keyof ToolchainConfig;

const ToolDefinitionSchema = z.object({
  executable: z.string(),
  runfiles: z.array(z.string().min(1)).optional(),
});

const ToolchainConfigSchema = z.object({
  codegen_tool: ToolDefinitionSchema.optional(),
  benchmark_codegen_tool: ToolDefinitionSchema.optional(),
});

export class ToolchainConfigError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ToolchainConfigError";
  }
}

/**
 * 設定ファイルのパスを解決
 * 引数 > 環境変数 HDL_RULES_TOOLCHAIN > 既定値
 */
export function resolveToolchainConfigPath(configPath?: string): string {
  return configPath ?? process.env.HDL_RULES_TOOLCHAIN ?? DEFAULT_TOOLCHAIN_CONFIG_PATH;
}

/**
 * JSON 値を ToolchainConfig に変換
 * @throws ToolchainConfigError - 形式不正の場合
 */
export function parseToolchainConfig(value: unknown, source = "<inline>"): ToolchainConfig {
  const result = ToolchainConfigSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ToolchainConfigError(`Invalid toolchain config ${source}: ${errors}`);
  }

  const config: ToolchainConfig = {};
  const { codegen_tool, benchmark_codegen_tool } = result.data;
  if (codegen_tool !== undefined) {
    config.codegen_tool = toToolDefinition(codegen_tool);
  }
  if (benchmark_codegen_tool !== undefined) {
    config.benchmark_codegen_tool = toToolDefinition(benchmark_codegen_tool);
  }
  return config;
}

/**
 * exactOptionalPropertyTypes に対応するため、undefined を除外
 */
function toToolDefinition(
  tool: z.infer<typeof ToolDefinitionSchema>
): ToolDefinition {
  return {
    executable: tool.executable,
    ...(tool.runfiles !== undefined && { runfiles: tool.runfiles }),
  };
}

/**
 * ツールチェーン設定を読み込む
 * @returns 設定ファイルがなければ null
 * @throws ToolchainConfigError - 読み込みまたは形式不正の場合
 */
export async function loadToolchainConfig(
  configPath?: string
): Promise<ToolchainConfig | null> {
  const resolvedPath = resolveToolchainConfigPath(configPath);
  let content: string;

  try {
    content = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw new ToolchainConfigError(`Failed to read toolchain config: ${resolvedPath}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ToolchainConfigError(`Invalid toolchain config JSON: ${resolvedPath}`, error);
  }

  return parseToolchainConfig(parsed, resolvedPath);
}
