/**
 * AnalyzeBenchmarkVerilog Use Case
 * 計測対象の Provider からベンチマークスクリプトのアクションを登録する
 */

import type {
  BenchmarkVerilogTarget,
  TargetProviders,
} from "../../types/index.js";
import type { ActionContext } from "../../actions/action-context.js";
import { mergeFiles } from "../../actions/runfiles.js";
import type { ToolchainConfig } from "../../toolchain/config.js";
import { buildBenchmarkAction } from "../../benchmark/benchmark-action.js";
import { BuildRuleError } from "../../errors.js";

/**
 * AnalyzeBenchmarkVerilog Use Case を実行
 * @param dependency - verilog_target の Provider
 */
export function analyzeBenchmarkVerilog(
  ctx: ActionContext,
  target: BenchmarkVerilogTarget,
  dependency: TargetProviders,
  toolchain: ToolchainConfig
): TargetProviders {
  const { codegen_info: codegenInfo, opt_ir_info: optIrInfo } = dependency;
  if (!codegenInfo || !optIrInfo) {
    throw new BuildRuleError(
      `Target '${target.verilog_target}' does not provide CodegenInfo and OptIrInfo`,
      "DEPENDENCY_FAILED",
      { target: target.verilog_target }
    );
  }

  const result = buildBenchmarkAction({
    ctx,
    verilogTarget: target.verilog_target,
    codegenInfo,
    optIrInfo,
    toolchain,
  });
  ctx.assertAllOutputsProduced();

  return {
    default_info: Object.freeze({
      files: Object.freeze(mergeFiles([result.executable], dependency.default_info.files)),
      runfiles: result.runfiles,
      executable: result.executable,
    }),
  };
}
