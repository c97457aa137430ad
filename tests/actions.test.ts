/**
 * ActionRegistry / ActionContext のテスト
 * @law 出力ファイルを生成するアクションは高々1つ
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ActionContext } from "../src/actions/action-context.js";
import { ActionRegistry } from "../src/actions/action-registry.js";
import {
  ArtifactPathError,
  findPackagePathProblem,
  joinPath,
  resolveInside,
  validateArtifactPath,
} from "../src/actions/path.js";
import { mergeFiles, mergeRunfiles } from "../src/actions/runfiles.js";
import {
  ActionConflictError,
  DuplicateOutputError,
  UnproducedOutputError,
} from "../src/errors.js";
import type { FileHandle } from "../src/types/index.js";

function sourceFile(path: string): FileHandle {
  return { path, short_path: path, root: "source" };
}

describe("validateArtifactPath", () => {
  it("should accept package-relative filenames", () => {
    expect(() => validateArtifactPath("a.sv")).not.toThrow();
    expect(() => validateArtifactPath("gen/a.sv")).not.toThrow();
  });

  it("should reject empty paths", () => {
    expect(() => validateArtifactPath("")).toThrow(ArtifactPathError);
    expect(() => validateArtifactPath("  ")).toThrow(ArtifactPathError);
  });

  it("should reject path traversal", () => {
    expect(() => validateArtifactPath("../a.sv")).toThrow("Path traversal detected: ../a.sv");
    expect(() => validateArtifactPath("gen/../../a.sv")).toThrow(ArtifactPathError);
  });

  it("should reject absolute paths", () => {
    expect(() => validateArtifactPath("/tmp/a.sv")).toThrow("Absolute path not allowed: /tmp/a.sv");
    expect(() => validateArtifactPath("C:\\a.sv")).toThrow(ArtifactPathError);
  });

  it("should allow dots inside names", () => {
    expect(() => validateArtifactPath("a..b.sv")).not.toThrow();
  });

  it("should reject non-canonical paths", () => {
    expect(() => validateArtifactPath("./a.sv")).toThrow("Non-canonical path: ./a.sv");
    expect(() => validateArtifactPath("gen/./a.sv")).toThrow(ArtifactPathError);
    expect(() => validateArtifactPath("gen//a.sv")).toThrow(ArtifactPathError);
    expect(() => validateArtifactPath("gen/")).toThrow(ArtifactPathError);
  });
});

describe("findPackagePathProblem", () => {
  it("should accept the root package and nested packages", () => {
    expect(findPackagePathProblem("")).toBeUndefined();
    expect(findPackagePathProblem("designs/adder")).toBeUndefined();
  });

  it("should reject packages outside the workspace", () => {
    expect(findPackagePathProblem("../../../escaped")).toBe("Path traversal detected");
    expect(findPackagePathProblem("/abs")).toBe("Absolute path not allowed");
    expect(findPackagePathProblem("C:/designs")).toBe("Absolute path not allowed");
    expect(findPackagePathProblem("designs/./adder")).toBe("Non-canonical path");
  });
});

describe("resolveInside", () => {
  it("should resolve paths below the root", () => {
    expect(resolveInside("/work", "hdl-out/bin/a.sh")).toBe("/work/hdl-out/bin/a.sh");
  });

  it("should reject paths leaving the root", () => {
    expect(() => resolveInside("/work", "hdl-out/bin/../../../escaped/b.sh")).toThrow(
      "Path escapes /work: hdl-out/bin/../../../escaped/b.sh"
    );
    expect(() => resolveInside("/work", "/etc/passwd")).toThrow(ArtifactPathError);
    expect(() => resolveInside("/work", ".")).toThrow(ArtifactPathError);
  });
});

describe("joinPath", () => {
  it("should skip empty segments", () => {
    expect(joinPath("hdl-out/bin", "", "a.sv")).toBe("hdl-out/bin/a.sv");
    expect(joinPath("", "a.sv")).toBe("a.sv");
  });
});

describe("runfiles", () => {
  it("should deduplicate by path keeping the first occurrence", () => {
    const a = sourceFile("a");
    const b = sourceFile("b");
    expect(mergeFiles([a, b], [sourceFile("a"), sourceFile("c")]).map((f) => f.path)).toEqual([
      "a",
      "b",
      "c",
    ]);
  });

  it("should put direct files before tool runfiles", () => {
    const merged = mergeRunfiles(
      [{ files: [sourceFile("tool"), sourceFile("in.ir")] }],
      [sourceFile("in.ir")]
    );
    expect(merged.files.map((f) => f.path)).toEqual(["in.ir", "tool"]);
  });
});

describe("ActionContext", () => {
  let registry: ActionRegistry;
  let ctx: ActionContext;

  beforeEach(() => {
    registry = new ActionRegistry();
    ctx = new ActionContext({ pkg: "designs/adder", name: "adder", registry });
  });

  it("should reject a package outside the workspace", () => {
    expect(
      () => new ActionContext({ pkg: "../escaped", name: "t", registry: new ActionRegistry() })
    ).toThrow("Path traversal detected: package '../escaped'");
  });

  it("should reject a filename that aliases another declared file", () => {
    ctx.declareFile("a.sv");
    expect(() => ctx.declareFile("./a.sv")).toThrow(ArtifactPathError);
  });

  it("should format the label from package and name", () => {
    expect(ctx.label).toBe("//designs/adder:adder");
  });

  it("should place declared files under the bin directory", () => {
    expect(ctx.declareFile("adder.sv")).toEqual({
      path: "hdl-out/bin/designs/adder/adder.sv",
      short_path: "designs/adder/adder.sv",
      root: "bin",
    });
  });

  it("should resolve source files relative to the package", () => {
    expect(ctx.sourceFile("adder.ir")).toEqual({
      path: "designs/adder/adder.ir",
      short_path: "designs/adder/adder.ir",
      root: "source",
    });
  });

  it("should reject declaring the same file twice", () => {
    ctx.declareFile("adder.sv");
    expect(() => ctx.declareFile("adder.sv")).toThrow(DuplicateOutputError);
  });

  it("should report declared files that no action produces", () => {
    const produced = ctx.declareFile("adder.sv");
    ctx.declareFile("adder.block.ir");
    ctx.write({ output: produced, content: "" });

    try {
      ctx.assertAllOutputsProduced();
      expect.fail("assertAllOutputsProduced should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(UnproducedOutputError);
      expect((error as UnproducedOutputError).message).toBe(
        "Output 'adder.block.ir' (hdl-out/bin/designs/adder/adder.block.ir) is never produced: no action generates it"
      );
    }
  });

  it("should register write actions as non-executable by default", () => {
    const output = ctx.declareFile("notes.txt");
    const action = ctx.write({ output, content: "hello" });

    expect(action).toEqual({
      kind: "file_write",
      owner: "//designs/adder:adder",
      output,
      content: "hello",
      is_executable: false,
    });
    expect(() => ctx.assertAllOutputsProduced()).not.toThrow();
  });
});

describe("ActionRegistry", () => {
  it("should reject a second producer of the same output", () => {
    const registry = new ActionRegistry();
    const first = new ActionContext({ pkg: "p", name: "first", registry });
    const second = new ActionContext({ pkg: "p", name: "second", registry });

    first.write({ output: first.declareFile("out.sv"), content: "" });

    try {
      second.write({ output: second.declareFile("out.sv"), content: "" });
      expect.fail("register should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ActionConflictError);
      expect((error as ActionConflictError).message).toBe(
        "Output 'hdl-out/bin/p/out.sv' of //p:second is already generated by //p:first"
      );
    }
    expect(registry.size).toBe(1);
    expect(registry.getProducer("hdl-out/bin/p/out.sv")).toBe("//p:first");
  });

  it("should reject an action listing the same output twice", () => {
    const registry = new ActionRegistry();
    const ctx = new ActionContext({ pkg: "p", name: "t", registry });
    const out = ctx.declareFile("a.sv");

    try {
      ctx.runShell({
        outputs: [out, out],
        inputs: [],
        tools: [],
        command: "gen",
        mnemonic: "Gen",
        progressMessage: "Generating",
      });
      expect.fail("runShell should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(DuplicateOutputError);
      expect((error as DuplicateOutputError).message).toBe(
        "File 'hdl-out/bin/p/a.sv' is declared more than once"
      );
    }
    expect(registry.size).toBe(0);
    expect(registry.getProducer(out.path)).toBeUndefined();
  });

  it("should not record partial outputs of a rejected action", () => {
    const registry = new ActionRegistry();
    const ctx = new ActionContext({ pkg: "", name: "t", registry });
    const a = ctx.declareFile("a");
    const b = ctx.declareFile("b");
    ctx.write({ output: b, content: "" });

    expect(() =>
      ctx.runShell({
        outputs: [a, b],
        inputs: [],
        tools: [],
        command: "gen",
        mnemonic: "Gen",
        progressMessage: "Generating",
      })
    ).toThrow(ActionConflictError);
    expect(registry.getProducer(a.path)).toBeUndefined();
    expect(registry.getActionsFor("//:t")).toHaveLength(1);
  });
});
