/**
 * 成果物ファイル名導出のテスト
 */

import { describe, it, expect } from "vitest";
import {
  deriveFilename,
  splitFilename,
  stripRoleExtension,
} from "../src/codegen/filenames.js";
import type { ArtifactRole } from "../src/types/index.js";

const ALL_ROLES: ArtifactRole[] = [
  "verilog",
  "module_signature",
  "schedule",
  "verilog_line_map",
  "block_ir",
];

describe("splitFilename", () => {
  it("should split at the last dot", () => {
    expect(splitFilename("adder.sv")).toEqual(["adder", "sv"]);
    expect(splitFilename("adder.opt.ir")).toEqual(["adder.opt", "ir"]);
  });

  it("should return empty extension when there is no dot", () => {
    expect(splitFilename("adder")).toEqual(["adder", ""]);
  });

  it("should ignore dots in directory names", () => {
    expect(splitFilename("gen.v1/adder")).toEqual(["gen.v1/adder", ""]);
    expect(splitFilename("gen.v1/adder.v")).toEqual(["gen.v1/adder", "v"]);
  });
});

describe("deriveFilename", () => {
  it("should append the fixed suffix of each role", () => {
    expect(deriveFilename("a", "module_signature")).toBe("a.sig.textproto");
    expect(deriveFilename("a", "schedule")).toBe("a.schedule.textproto");
    expect(deriveFilename("a", "verilog_line_map")).toBe("a.verilog_line_map.textproto");
    expect(deriveFilename("a", "block_ir")).toBe("a.block.ir");
  });

  it("should use the chosen Verilog extension for the verilog role", () => {
    expect(deriveFilename("a", "verilog")).toBe("a.sv");
    expect(deriveFilename("a", "verilog", "v")).toBe("a.v");
  });
});

describe("stripRoleExtension", () => {
  it("should recover the basename for every role", () => {
    for (const basename of ["a", "adder.opt", "nested/dir/core"]) {
      for (const role of ALL_ROLES) {
        expect(stripRoleExtension(deriveFilename(basename, role), role)).toBe(basename);
      }
    }
  });

  it("should return undefined when the suffix does not match", () => {
    expect(stripRoleExtension("a.block.ir", "schedule")).toBeUndefined();
    expect(stripRoleExtension("a.txt", "verilog")).toBeUndefined();
  });
});
