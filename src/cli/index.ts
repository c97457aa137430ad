#!/usr/bin/env node
/**
 * hdl-rules CLI
 * ビルドファイルの解析・codegen 引数の検証・MCP Server の起動
 */

import * as path from "node:path";
import { startMcpServer } from "../mcp/server.js";
import { BuildPlanner } from "../engine/build-planner.js";
import { toAnalysisJson } from "../engine/serialize.js";
import { BuildFileParseError } from "../build/parser.js";
import { planArtifacts, mergeWithDefaults } from "../codegen/planner.js";
import { findUnknownArgs, isSystemVerilog } from "../codegen/validator.js";
import { BuildRuleError } from "../errors.js";
import { ArtifactPathError } from "../actions/path.js";
import { DEFAULT_BIN_DIR } from "../actions/action-context.js";
import {
  loadToolchainConfig,
  resolveToolchainConfigPath,
  ToolchainConfigError,
  type ToolchainConfig,
} from "../toolchain/config.js";
import { createLogger } from "../utils/log.js";
import {
  CliError,
  parseCliArgs,
  parseStringRecord,
  requireSingleBuildFile,
  type CliOptions,
} from "./args.js";

const logger = createLogger();

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv.length === 0 || argv[0] === "help" || argv.includes("--help")) {
    outputHelp();
    return;
  }

  try {
    const { command, options, positionals } = parseCliArgs(argv);
    if (command !== "serve" && positionals.length > 0) {
      throw new CliError("INVALID_INPUT", `Unexpected argument: ${positionals[0]}`);
    }

    switch (command) {
      case "plan":
        await commandPlan(options);
        break;
      case "validate-args":
        commandValidateArgs(options);
        break;
      case "write-scripts":
        await commandWriteScripts(options);
        break;
      case "serve":
        await startServer(options, positionals);
        break;
      case undefined:
        throw new CliError("INVALID_INPUT", "A command is required");
      default:
        throw new CliError("INVALID_INPUT", `Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof CliError || error instanceof BuildRuleError) {
      outputError(error.code, error.message, error.details);
      process.exitCode = 1;
      return;
    }
    if (
      error instanceof BuildFileParseError ||
      error instanceof ToolchainConfigError ||
      error instanceof ArtifactPathError
    ) {
      outputError("INVALID_INPUT", error.message);
      process.exitCode = 1;
      return;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    outputError("INTERNAL_ERROR", message);
    process.exitCode = 1;
  }
}

function outputJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function outputError(code: string, message: string, details?: unknown): void {
  const errorPayload: { error: { code: string; message: string; details?: unknown } } = {
    error: { code, message },
  };
  if (details !== undefined) {
    errorPayload.error.details = details;
  }
  outputJson(errorPayload);
}

function outputHelp(): void {
  outputJson({
    commands: {
      plan: "Analyze a build file and print the registered actions and providers",
      "validate-args": "Validate codegen arguments and plan the output artifacts",
      "write-scripts": "Analyze a build file and write benchmark scripts to disk",
      serve: "Start MCP server",
    },
    options: {
      common: ["--toolchain", "--bin-dir"],
      plan: ["--build", "--keep-going"],
      "validate-args": ["--args", "--verilog-file"],
      "write-scripts": ["--build", "--out-dir"],
      serve: ["--build (repeatable)"],
    },
    env: {
      HDL_RULES_TOOLCHAIN: "Toolchain config path (default: .hdl_rules/toolchain.json)",
      HDL_RULES_BIN_DIR: `Generated file directory (default: ${DEFAULT_BIN_DIR})`,
      HDL_RULES_WORKSPACE_ROOT: "Root directory for write-scripts (default: cwd)",
      HDL_RULES_SILENT: "Set to 1 to silence stderr logs",
    },
  });
}

async function resolveToolchain(options: CliOptions): Promise<ToolchainConfig> {
  const configPath = resolveToolchainConfigPath(options.toolchain);
  const toolchain = await loadToolchainConfig(configPath);
  if (!toolchain) {
    logger.info(`No toolchain config at ${configPath}; tools are unresolved`);
    return {};
  }
  return toolchain;
}

function resolveBinDir(options: CliOptions): string {
  return options.binDir ?? process.env.HDL_RULES_BIN_DIR ?? DEFAULT_BIN_DIR;
}

async function createPlanner(options: CliOptions): Promise<BuildPlanner> {
  return new BuildPlanner({
    toolchain: await resolveToolchain(options),
    binDir: resolveBinDir(options),
    logger,
  });
}

async function commandPlan(options: CliOptions): Promise<void> {
  const buildPath = requireSingleBuildFile(options);

  const planner = await createPlanner(options);
  const buildFile = await planner.loadBuildFile(buildPath);
  const result = planner.analyze(buildFile, { keepGoing: options.keepGoing });

  outputJson(toAnalysisJson(result));
  if (result.failures.length > 0) {
    process.exitCode = 1;
  }
}

function commandValidateArgs(options: CliOptions): void {
  const codegenArgs = parseStringRecord(options.args ?? "{}", "--args");
  const verilogFile = options.verilogFile;

  const unknownKeys = findUnknownArgs(codegenArgs);
  if (unknownKeys.length > 0) {
    outputJson({ valid: false, unknown_keys: unknownKeys });
    process.exitCode = 1;
    return;
  }

  if (verilogFile === undefined) {
    const merged = mergeWithDefaults(codegenArgs);
    outputJson({ valid: true, args: merged, use_system_verilog: isSystemVerilog(merged) });
    return;
  }

  const plan = planArtifacts({ codegenArgs, verilogFile });
  outputJson({
    valid: true,
    args: plan.args,
    generator_mode: plan.mode,
    use_system_verilog: plan.useSystemVerilog,
    descriptors: plan.descriptors,
  });
}

async function commandWriteScripts(options: CliOptions): Promise<void> {
  const buildPath = requireSingleBuildFile(options);
  const outDir = path.resolve(
    options.outDir ?? process.env.HDL_RULES_WORKSPACE_ROOT ?? process.cwd()
  );

  const planner = await createPlanner(options);
  const buildFile = await planner.loadBuildFile(buildPath);
  const result = planner.analyze(buildFile);
  const written = await planner.materialize(result, outDir);

  outputJson({ out_dir: outDir, written });
}

async function startServer(options: CliOptions, positionals: string[]): Promise<void> {
  await startMcpServer({
    buildFiles: [...positionals, ...options.build],
    toolchain: await resolveToolchain(options),
    binDir: resolveBinDir(options),
  });
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  outputError("INTERNAL_ERROR", message);
  process.exit(1);
});
