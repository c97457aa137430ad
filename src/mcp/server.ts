/**
 * MCP Server
 * Model Context Protocol サーバー実装
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { CodegenInfo, Label } from "../types/index.js";
import { BuildPlanner } from "../engine/build-planner.js";
import { toAnalysisJson } from "../engine/serialize.js";
import { BuildFileParseError } from "../build/parser.js";
import { planArtifacts } from "../codegen/planner.js";
import { findUnknownArgs } from "../codegen/validator.js";
import { ArtifactPathError } from "../actions/path.js";
import { BuildRuleError } from "../errors.js";
import type { ToolchainConfig } from "../toolchain/config.js";
import { createLogger } from "../utils/log.js";

/**
 * MCP Server 設定
 */
export interface McpServerConfig {
  /** 起動時に解析するビルドファイルのパス */
  buildFiles?: string[];
  toolchain?: ToolchainConfig;
  /** 生成ファイルのディレクトリ */
  binDir?: string;
}

const RESOURCE_SCHEME = "hdlrules";

const CodegenArgsInput = z.record(z.string()).default({});

const PlanBuildArgs = z.object({
  build_file: z.string().min(1),
  keep_going: z.boolean().optional(),
});

const PlanCodegenArgs = z.object({
  package: z.string().optional(),
  name: z.string().min(1),
  src: z.string().min(1),
  verilog_file: z.string().min(1),
  codegen_args: CodegenArgsInput,
  module_sig_file: z.string().min(1).optional(),
  schedule_file: z.string().min(1).optional(),
  verilog_line_map_file: z.string().min(1).optional(),
  block_ir_file: z.string().min(1).optional(),
});

const ValidateArgsArgs = z.object({
  codegen_args: CodegenArgsInput,
  verilog_file: z.string().min(1).optional(),
});

/**
 * CodegenInfo リソースの URI
 */
export function codegenInfoUri(label: Label): string {
  const [pkg, name] = label.slice(2).split(":");
  return `${RESOURCE_SCHEME}://targets/${pkg ? `${pkg}/` : ""}${name}/codegen_info`;
}

function textResult(value: unknown): { content: Array<{ type: "text"; text: string }> } {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/**
 * hdl-rules MCP Server を作成
 */
export async function createMcpServer(config: McpServerConfig = {}): Promise<Server> {
  const logger = createLogger();

  const server = new Server(
    {
      name: "hdl-rules",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  const planner = new BuildPlanner({
    ...(config.toolchain !== undefined && { toolchain: config.toolchain }),
    ...(config.binDir !== undefined && { binDir: config.binDir }),
    logger,
  });

  // 起動時のビルドファイルを解析し、CodegenInfo をリソースとして公開
  const codegenInfos = new Map<string, { label: Label; info: CodegenInfo }>();
  for (const file of config.buildFiles ?? []) {
    try {
      const buildFile = await planner.loadBuildFile(file);
      const result = planner.analyze(buildFile, { keepGoing: true });
      for (const [label, providers] of result.providers) {
        if (providers.codegen_info) {
          codegenInfos.set(codegenInfoUri(label), { label, info: providers.codegen_info });
        }
      }
    } catch (error) {
      logger.error(`Failed to load build file ${file}:`, error);
    }
  }

  // ツール一覧
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "hdl_rules.plan_build",
          description: "Analyze a build file and return the registered actions and providers",
          inputSchema: {
            type: "object" as const,
            properties: {
              build_file: {
                type: "string",
                description: "Path to the YAML build file",
              },
              keep_going: {
                type: "boolean",
                description: "Continue analyzing other targets after a failure",
              },
            },
            required: ["build_file"],
          },
        },
        {
          name: "hdl_rules.plan_codegen",
          description: "Plan a single IR-to-Verilog codegen action",
          inputSchema: {
            type: "object" as const,
            properties: {
              package: { type: "string", description: "Package path" },
              name: { type: "string", description: "Target name" },
              src: { type: "string", description: "Input IR file (package relative)" },
              verilog_file: {
                type: "string",
                description: "Generated Verilog filename (.sv or .v)",
              },
              codegen_args: {
                type: "object",
                description: "Codegen arguments (flag name to string value)",
              },
              module_sig_file: { type: "string" },
              schedule_file: { type: "string" },
              verilog_line_map_file: { type: "string" },
              block_ir_file: { type: "string" },
            },
            required: ["name", "src", "verilog_file"],
          },
        },
        {
          name: "hdl_rules.validate_codegen_args",
          description: "Validate codegen arguments and list the planned artifacts",
          inputSchema: {
            type: "object" as const,
            properties: {
              codegen_args: {
                type: "object",
                description: "Codegen arguments (flag name to string value)",
              },
              verilog_file: {
                type: "string",
                description: "Generated Verilog filename; enables extension checks",
              },
            },
            required: ["codegen_args"],
          },
        },
      ],
    };
  });

  // ツール実行
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "hdl_rules.plan_build": {
          const input = PlanBuildArgs.parse(args ?? {});
          const buildFile = await planner.loadBuildFile(input.build_file);
          const result = planner.analyze(buildFile, { keepGoing: input.keep_going ?? false });
          return textResult(toAnalysisJson(result));
        }

        case "hdl_rules.plan_codegen": {
          const { package: pkg, ...target } = PlanCodegenArgs.parse(args ?? {});
          const result = planner.planCodegen({
            ...(pkg !== undefined && { pkg }),
            target: {
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
            },
          });
          return textResult(toAnalysisJson(result));
        }

        case "hdl_rules.validate_codegen_args": {
          const input = ValidateArgsArgs.parse(args ?? {});
          const unknownKeys = findUnknownArgs(input.codegen_args);
          if (unknownKeys.length > 0) {
            return textResult({ valid: false, unknown_keys: unknownKeys });
          }
          if (input.verilog_file === undefined) {
            return textResult({ valid: true });
          }
          const plan = planArtifacts({
            codegenArgs: input.codegen_args,
            verilogFile: input.verilog_file,
          });
          return textResult({
            valid: true,
            generator_mode: plan.mode,
            use_system_verilog: plan.useSystemVerilog,
            descriptors: plan.descriptors,
          });
        }

        default:
          return {
            content: [{ type: "text", text: `Unknown tool: ${name}` }],
            isError: true,
          };
      }
    } catch (error) {
      // 入力起因のエラーはメッセージをそのまま返す
      // その他のエラーは内部詳細を隠蔽
      let publicMessage: string;
      let errorCode: string;

      if (error instanceof BuildRuleError) {
        publicMessage = error.message;
        errorCode = error.code;
      } else if (
        error instanceof z.ZodError ||
        error instanceof BuildFileParseError ||
        error instanceof ArtifactPathError
      ) {
        publicMessage = error.message;
        errorCode = "INVALID_INPUT";
      } else {
        logger.error("MCP Server internal error:", error);
        publicMessage = "Internal server error";
        errorCode = "INTERNAL_ERROR";
      }

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({
              error: publicMessage,
              code: errorCode,
            }),
          },
        ],
        isError: true,
      };
    }
  });

  // リソース一覧
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [...codegenInfos].map(([uri, { label }]) => ({
        uri,
        name: `CodegenInfo ${label}`,
        mimeType: "application/json",
        description: `Codegen artifacts and settings of ${label}`,
      })),
    };
  });

  // リソース読み取り
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const entry = codegenInfos.get(uri);
    if (!entry) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }

    return {
      contents: [
        {
          uri,
          mimeType: "application/json",
          text: JSON.stringify(entry.info, null, 2),
        },
      ],
    };
  });

  return server;
}

/**
 * MCP Server を起動（stdio transport）
 */
export async function startMcpServer(config: McpServerConfig = {}): Promise<void> {
  const server = await createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  createLogger().info("hdl-rules MCP server started");
}
