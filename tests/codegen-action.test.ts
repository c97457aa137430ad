/**
 * codegen アクション構築のテスト
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ActionContext } from "../src/actions/action-context.js";
import { ActionRegistry } from "../src/actions/action-registry.js";
import { buildCodegenAction } from "../src/codegen/codegen-action.js";
import { createCodegenInfo, resolveTop } from "../src/codegen/metadata.js";
import { planArtifacts } from "../src/codegen/planner.js";
import { ToolResolutionError } from "../src/errors.js";
import type { ToolchainConfig } from "../src/toolchain/config.js";

const toolchain: ToolchainConfig = {
  codegen_tool: {
    executable: "tools/codegen_main",
    runfiles: ["tools/delay_models.bin"],
  },
};

describe("buildCodegenAction", () => {
  let registry: ActionRegistry;
  let ctx: ActionContext;

  beforeEach(() => {
    registry = new ActionRegistry();
    ctx = new ActionContext({ pkg: "designs/adder", name: "adder_verilog", registry });
  });

  it("should register one action producing every planned file", () => {
    const plan = planArtifacts({
      codegenArgs: { top: "add", pipeline_stages: "2" },
      verilogFile: "adder.sv",
    });
    const src = ctx.sourceFile("adder.opt.ir");

    const result = buildCodegenAction({ ctx, plan, src, toolchain });

    expect(registry.size).toBe(1);
    expect(result.action.mnemonic).toBe("Codegen");
    expect(result.action.owner).toBe("//designs/adder:adder_verilog");
    expect(result.action.progress_message).toBe(
      "Building Verilog file: hdl-out/bin/designs/adder/adder.sv"
    );
    expect(result.action.command).toBe(
      [
        "tools/codegen_main",
        "designs/adder/adder.opt.ir",
        "--delay_model=unit",
        "--pipeline_stages=2",
        "--top=add",
        "--use_system_verilog=True",
        "--output_verilog_path=hdl-out/bin/designs/adder/adder.sv",
        "--output_signature_path=hdl-out/bin/designs/adder/adder.sig.textproto",
        "--output_schedule_path=hdl-out/bin/designs/adder/adder.schedule.textproto",
        "--output_verilog_line_map_path=hdl-out/bin/designs/adder/adder.verilog_line_map.textproto",
        "--output_block_ir_path=hdl-out/bin/designs/adder/adder.block.ir",
      ].join(" ")
    );
    expect(result.action.outputs.map((f) => f.short_path)).toEqual([
      "designs/adder/adder.sv",
      "designs/adder/adder.sig.textproto",
      "designs/adder/adder.schedule.textproto",
      "designs/adder/adder.verilog_line_map.textproto",
      "designs/adder/adder.block.ir",
    ]);
    expect(result.action.inputs.map((f) => f.path)).toEqual([
      "designs/adder/adder.opt.ir",
      "tools/codegen_main",
      "tools/delay_models.bin",
    ]);
    expect(result.action.tools).toEqual([
      { path: "tools/codegen_main", short_path: "tools/codegen_main", root: "source" },
    ]);
  });

  it("should produce the same command regardless of arg insertion order", () => {
    const other = new ActionContext({
      pkg: "designs/adder",
      name: "adder_verilog",
      registry: new ActionRegistry(),
    });
    const first = buildCodegenAction({
      ctx,
      plan: planArtifacts({
        codegenArgs: { top: "add", reset: "rst", clock_period_ps: "1000" },
        verilogFile: "adder.sv",
      }),
      src: ctx.sourceFile("adder.opt.ir"),
      toolchain,
    });
    const second = buildCodegenAction({
      ctx: other,
      plan: planArtifacts({
        codegenArgs: { clock_period_ps: "1000", reset: "rst", top: "add" },
        verilogFile: "adder.sv",
      }),
      src: other.sourceFile("adder.opt.ir"),
      toolchain,
    });

    expect(second.action.command).toBe(first.action.command);
  });

  it("should have no schedule for the combinational generator", () => {
    const plan = planArtifacts({
      codegenArgs: { generator: "combinational", use_system_verilog: "False" },
      verilogFile: "b.v",
    });

    const result = buildCodegenAction({ ctx, plan, src: ctx.sourceFile("b.ir"), toolchain });

    expect(result.files.generator_mode).toBe("combinational");
    expect(result.files.schedule_file).toBeNull();
    expect(result.builtFiles).toHaveLength(4);
    expect(result.action.command).not.toContain("--output_schedule_path=");
  });

  it("should register nothing when the codegen tool is not configured", () => {
    const plan = planArtifacts({ codegenArgs: {}, verilogFile: "a.sv" });

    expect(() =>
      buildCodegenAction({ ctx, plan, src: ctx.sourceFile("a.ir"), toolchain: {} })
    ).toThrow(ToolResolutionError);
    expect(registry.size).toBe(0);
  });

  it("should place outputs under a custom bin directory", () => {
    const custom = new ActionContext({
      pkg: "",
      name: "top_verilog",
      registry,
      binDir: "out",
    });
    const plan = planArtifacts({ codegenArgs: {}, verilogFile: "top.sv" });

    const result = buildCodegenAction({ ctx: custom, plan, src: custom.sourceFile("top.ir"), toolchain });

    expect(result.files.verilog_file).toEqual({
      path: "out/top.sv",
      short_path: "top.sv",
      root: "bin",
    });
    expect(result.action.owner).toBe("//:top_verilog");
  });
});

describe("createCodegenInfo", () => {
  it("should carry files and selected settings", () => {
    const registry = new ActionRegistry();
    const ctx = new ActionContext({ pkg: "p", name: "t", registry });
    const plan = planArtifacts({
      codegenArgs: { module_name: "m", top: "ignored", clock_period_ps: "750" },
      verilogFile: "t.sv",
    });
    const { files } = buildCodegenAction({ ctx, plan, src: ctx.sourceFile("t.ir"), toolchain });

    const info = createCodegenInfo(files, plan.args);

    expect(info.top).toBe("m");
    expect(info.delay_model).toBe("unit");
    expect(info.clock_period_ps).toBe("750");
    expect(info.pipeline_stages).toBeUndefined();
    expect(info.generator_mode).toBe("pipeline");
    expect(info.schedule_file?.short_path).toBe("p/t.schedule.textproto");
    expect(info.verilog_file.short_path).toBe("p/t.sv");
    expect(Object.isFrozen(info)).toBe(true);
  });
});

describe("resolveTop", () => {
  it("should prefer module_name over top", () => {
    expect(resolveTop({ module_name: "a", top: "b" })).toBe("a");
    expect(resolveTop({ top: "b" })).toBe("b");
    expect(resolveTop({})).toBeUndefined();
  });
});
