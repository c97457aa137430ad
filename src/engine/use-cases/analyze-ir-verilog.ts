/**
 * AnalyzeIrVerilog Use Case
 * ir_verilog ターゲットの成果物を計画し、codegen アクションを登録する
 */

import type {
  IrVerilogTarget,
  OutputOverrides,
  TargetProviders,
} from "../../types/index.js";
import type { ActionContext } from "../../actions/action-context.js";
import type { ToolchainConfig } from "../../toolchain/config.js";
import { planArtifacts } from "../../codegen/planner.js";
import { buildCodegenAction } from "../../codegen/codegen-action.js";
import { createCodegenInfo } from "../../codegen/metadata.js";

/**
 * ターゲット定義から明示指定された出力ファイル名だけを取り出す
 */
function pickOverrides(target: IrVerilogTarget): OutputOverrides {
  return {
    ...(target.module_sig_file !== undefined && { module_sig_file: target.module_sig_file }),
    ...(target.schedule_file !== undefined && { schedule_file: target.schedule_file }),
    ...(target.verilog_line_map_file !== undefined && {
      verilog_line_map_file: target.verilog_line_map_file,
    }),
    ...(target.block_ir_file !== undefined && { block_ir_file: target.block_ir_file }),
  };
}

/**
 * AnalyzeIrVerilog Use Case を実行
 * 失敗時はアクションを登録しない
 */
export function analyzeIrVerilog(
  ctx: ActionContext,
  target: IrVerilogTarget,
  toolchain: ToolchainConfig
): TargetProviders {
  const plan = planArtifacts({
    codegenArgs: target.codegen_args,
    verilogFile: target.verilog_file,
    overrides: pickOverrides(target),
  });

  const src = ctx.sourceFile(target.src);
  const result = buildCodegenAction({ ctx, plan, src, toolchain });
  ctx.assertAllOutputsProduced();

  return {
    codegen_info: createCodegenInfo(result.files, plan.args),
    // codegen の入力は最適化済み IR とみなす
    opt_ir_info: Object.freeze({ opt_ir_file: src }),
    default_info: Object.freeze({
      files: Object.freeze([...result.builtFiles]),
      runfiles: result.runfiles,
    }),
  };
}
