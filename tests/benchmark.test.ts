/**
 * ベンチマークスクリプト構築のテスト
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ActionContext } from "../src/actions/action-context.js";
import { ActionRegistry } from "../src/actions/action-registry.js";
import {
  buildBenchmarkAction,
  buildBenchmarkCommand,
  renderBenchmarkScript,
} from "../src/benchmark/benchmark-action.js";
import { buildCodegenAction } from "../src/codegen/codegen-action.js";
import { createCodegenInfo } from "../src/codegen/metadata.js";
import { planArtifacts } from "../src/codegen/planner.js";
import { MissingTopError, ToolResolutionError } from "../src/errors.js";
import type { ToolchainConfig } from "../src/toolchain/config.js";
import type { CodegenArgs, CodegenInfo, OptIrInfo } from "../src/types/index.js";

const toolchain: ToolchainConfig = {
  codegen_tool: { executable: "tools/codegen_main" },
  benchmark_codegen_tool: { executable: "tools/benchmark_codegen_main" },
};

describe("benchmark action", () => {
  let registry: ActionRegistry;

  beforeEach(() => {
    registry = new ActionRegistry();
  });

  function analyzeVerilog(args: CodegenArgs): { info: CodegenInfo; optIr: OptIrInfo } {
    const ctx = new ActionContext({ pkg: "designs/adder", name: "adder_verilog", registry });
    const plan = planArtifacts({ codegenArgs: args, verilogFile: "adder.sv" });
    const src = ctx.sourceFile("adder.opt.ir");
    const { files } = buildCodegenAction({ ctx, plan, src, toolchain });
    return { info: createCodegenInfo(files, plan.args), optIr: { opt_ir_file: src } };
  }

  function benchmarkContext(): ActionContext {
    return new ActionContext({ pkg: "designs/adder", name: "adder_benchmark", registry });
  }

  it("should write an executable script invoking the benchmark tool", () => {
    const { info, optIr } = analyzeVerilog({ top: "add", pipeline_stages: "2" });
    const ctx = benchmarkContext();

    const result = buildBenchmarkAction({
      ctx,
      verilogTarget: "adder_verilog",
      codegenInfo: info,
      optIrInfo: optIr,
      toolchain,
    });

    expect(result.executable.path).toBe("hdl-out/bin/designs/adder/adder_benchmark.sh");
    expect(result.action.is_executable).toBe(true);
    expect(result.action.owner).toBe("//designs/adder:adder_benchmark");
    expect(result.action.content).toBe(
      [
        "#!/usr/bin/env bash",
        "set -e",
        "tools/benchmark_codegen_main designs/adder/adder.opt.ir designs/adder/adder.block.ir designs/adder/adder.sv --top=add --delay_model=unit --pipeline_stages=2",
        "exit 0",
      ].join("\n")
    );
    expect(result.runfiles.files.map((f) => f.path)).toEqual([
      "designs/adder/adder.opt.ir",
      "hdl-out/bin/designs/adder/adder.block.ir",
      "hdl-out/bin/designs/adder/adder.sv",
      "tools/benchmark_codegen_main",
    ]);
    expect(registry.size).toBe(2);
  });

  it("should fail with MissingTopError and register nothing when top is absent", () => {
    const { info, optIr } = analyzeVerilog({});
    const ctx = benchmarkContext();

    try {
      buildBenchmarkAction({
        ctx,
        verilogTarget: "adder_verilog",
        codegenInfo: info,
        optIrInfo: optIr,
        toolchain,
      });
      expect.fail("buildBenchmarkAction should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingTopError);
      expect((error as MissingTopError).message).toBe(
        "Verilog target 'adder_verilog' does not provide a top value"
      );
    }
    expect(registry.getActionsFor(ctx.label)).toEqual([]);
    expect(registry.size).toBe(1);
  });

  it("should fail when the benchmark tool is not configured", () => {
    const { info, optIr } = analyzeVerilog({ top: "add" });

    expect(() =>
      buildBenchmarkAction({
        ctx: benchmarkContext(),
        verilogTarget: "adder_verilog",
        codegenInfo: info,
        optIrInfo: optIr,
        toolchain: { codegen_tool: { executable: "tools/codegen_main" } },
      })
    ).toThrow(ToolResolutionError);
    expect(registry.size).toBe(1);
  });
});

describe("buildBenchmarkCommand", () => {
  it("should include clock_period_ps only when set", () => {
    const registry = new ActionRegistry();
    const ctx = new ActionContext({ pkg: "", name: "core", registry });
    const plan = planArtifacts({
      codegenArgs: { module_name: "core_top", clock_period_ps: "1000", delay_model: "asap7" },
      verilogFile: "core.sv",
    });
    const src = ctx.sourceFile("core.ir");
    const { files } = buildCodegenAction({ ctx, plan, src, toolchain });
    const info = createCodegenInfo(files, plan.args);

    const command = buildBenchmarkCommand(
      { path: "bench", short_path: "bench", root: "source" },
      "core_top",
      info,
      { opt_ir_file: src }
    );

    expect(command.toString()).toBe(
      "bench core.ir core.block.ir core.sv --top=core_top --delay_model=asap7 --clock_period_ps=1000"
    );
  });
});

describe("renderBenchmarkScript", () => {
  it("should wrap the command in a bash script", () => {
    expect(renderBenchmarkScript("run")).toBe("#!/usr/bin/env bash\nset -e\nrun\nexit 0");
  });
});
