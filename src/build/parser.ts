/**
 * ビルドファイル YAML パーサー
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { BuildFile, Target } from "../types/index.js";

/**
 * パースエラー
 */
export class BuildFileParseError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "BuildFileParseError";
  }
}

// =============================================================================
// Zod スキーマ定義
// =============================================================================

/**
 * codegen 引数の値
 * YAML のスカラー（数値・真偽値）は文字列化する
 */
const CodegenArgValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const OutputFilenameSchema = z.string().min(1);

const IrVerilogTargetSchema = z.object({
  kind: z.literal("ir_verilog"),
  name: z.string().min(1),
  src: z.string().min(1),
  verilog_file: z.string().min(1),
  codegen_args: z.record(CodegenArgValueSchema).default({}),
  module_sig_file: OutputFilenameSchema.optional(),
  schedule_file: OutputFilenameSchema.optional(),
  verilog_line_map_file: OutputFilenameSchema.optional(),
  block_ir_file: OutputFilenameSchema.optional(),
});

const BenchmarkVerilogTargetSchema = z.object({
  kind: z.literal("benchmark_verilog"),
  name: z.string().min(1),
  verilog_target: z.string().min(1),
});

const TargetSchema = z.discriminatedUnion("kind", [
  IrVerilogTargetSchema,
  BenchmarkVerilogTargetSchema,
]);

const BuildFileYamlSchema = z.object({
  package: z.string().default(""),
  targets: z.array(TargetSchema).min(1),
});

type BuildFileYaml = z.infer<typeof BuildFileYamlSchema>;
type TargetYaml = BuildFileYaml["targets"][number];

// =============================================================================
// パース関数
// =============================================================================

/**
 * YAML 文字列を BuildFile 型にパースする
 * @param yaml - ビルドファイルの YAML 文字列
 * @throws BuildFileParseError - パースまたは形式検証の失敗時
 */
export function parseBuildFile(yaml: string): BuildFile {
  let parsed: unknown;

  try {
    parsed = parseYaml(yaml);
  } catch (error) {
    throw new BuildFileParseError("Invalid YAML syntax", error);
  }

  const result = BuildFileYamlSchema.safeParse(parsed);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new BuildFileParseError(`Invalid build file: ${errors}`);
  }

  return {
    package: result.data.package.replace(/^\/+|\/+$/g, ""),
    targets: result.data.targets.map(yamlToTarget),
  };
}

/**
 * パース結果を Target 型に変換
 * exactOptionalPropertyTypes に対応するため、undefined を除外
 */
function yamlToTarget(target: TargetYaml): Target {
  if (target.kind === "benchmark_verilog") {
    return {
      kind: target.kind,
      name: target.name,
      verilog_target: target.verilog_target,
    };
  }

  return {
    kind: target.kind,
    name: target.name,
    src: target.src,
    verilog_file: target.verilog_file,
    codegen_args: target.codegen_args,
    ...(target.module_sig_file !== undefined && { module_sig_file: target.module_sig_file }),
    ...(target.schedule_file !== undefined && { schedule_file: target.schedule_file }),
    ...(target.verilog_line_map_file !== undefined && {
      verilog_line_map_file: target.verilog_line_map_file,
    }),
    ...(target.block_ir_file !== undefined && { block_ir_file: target.block_ir_file }),
  };
}

/**
 * ファイルから BuildFile を読み込む
 * @param filePath - YAML ファイルのパス
 * @throws BuildFileParseError - 読み込みまたはパース失敗時
 */
export async function parseBuildFileFromPath(filePath: string): Promise<BuildFile> {
  const fs = await import("node:fs/promises");

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new BuildFileParseError(`Failed to read file: ${filePath}`, error);
  }

  return parseBuildFile(content);
}
