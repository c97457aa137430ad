/**
 * Build Planner
 * ビルドファイルの解析（アクショングラフ構築）の Facade
 *
 * 解析ごとに新しい ActionRegistry を使い、呼び出し間で状態を共有しない。
 * 同じ入力からは常に同じアクション列を生成する
 */

import type {
  BuildAction,
  BuildFile,
  IrVerilogTarget,
  Label,
  Target,
  TargetProviders,
} from "../types/index.js";
import { ActionContext } from "../actions/action-context.js";
import { ActionRegistry } from "../actions/action-registry.js";
import { parseBuildFileFromPath } from "../build/parser.js";
import { validateBuildFile } from "../build/validator.js";
import { BuildRuleError } from "../errors.js";
import type { ToolchainConfig } from "../toolchain/config.js";
import type { Logger } from "../utils/log.js";
import { analyzeIrVerilog } from "./use-cases/analyze-ir-verilog.js";
import { analyzeBenchmarkVerilog } from "./use-cases/analyze-benchmark-verilog.js";
import { materialize as materializeUseCase } from "./use-cases/materialize.js";

/**
 * Build Planner オプション
 */
export interface BuildPlannerOptions {
  /** ツールチェーン設定（未指定時は空: ツール使用時に ToolResolutionError） */
  toolchain?: ToolchainConfig;
  /** 生成ファイルのディレクトリ（デフォルト: hdl-out/bin） */
  binDir?: string;
  logger?: Logger;
}

export interface AnalyzeOptions {
  /** 失敗したターゲットがあっても残りを解析する */
  keepGoing?: boolean;
}

/**
 * 解析に失敗したターゲット
 */
export interface TargetFailure {
  label: Label;
  code: string;
  message: string;
  details?: unknown;
}

export interface AnalysisResult {
  package: string;
  /** 登録順のアクション */
  actions: readonly BuildAction[];
  providers: ReadonlyMap<Label, TargetProviders>;
  failures: TargetFailure[];
}

/**
 * 単一ターゲットの codegen 計画パラメータ
 */
export interface PlanCodegenParams {
  pkg?: string;
  target: Omit<IrVerilogTarget, "kind">;
}

/**
 * 依存順（ir_verilog → benchmark_verilog）、各グループ内は宣言順
 */
function orderTargets(targets: readonly Target[]): Target[] {
  return [
    ...targets.filter((t) => t.kind === "ir_verilog"),
    ...targets.filter((t) => t.kind === "benchmark_verilog"),
  ];
}

function toFailure(label: Label, error: unknown): TargetFailure {
  if (error instanceof BuildRuleError) {
    return {
      label,
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
    };
  }
  if (error instanceof Error) {
    return { label, code: error.name, message: error.message };
  }
  return { label, code: "INTERNAL_ERROR", message: String(error) };
}

export class BuildPlanner {
  private readonly toolchain: ToolchainConfig;
  private readonly binDir: string | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: BuildPlannerOptions = {}) {
    this.toolchain = options.toolchain ?? {};
    this.binDir = options.binDir;
    this.logger = options.logger;
  }

  /**
   * ビルドファイルの整合性を検証
   * @throws BuildRuleError - INVALID_BUILD_FILE
   */
  checkBuildFile(buildFile: BuildFile): void {
    const validation = validateBuildFile(buildFile);
    if (!validation.valid) {
      throw new BuildRuleError(
        `Invalid build file for package '${buildFile.package}'`,
        "INVALID_BUILD_FILE",
        { errors: validation.errors }
      );
    }
  }

  /**
   * ファイルからビルドファイルを読み込み、検証する
   * @throws BuildFileParseError - 読み込み・パース失敗
   * @throws BuildRuleError - INVALID_BUILD_FILE
   */
  async loadBuildFile(filePath: string): Promise<BuildFile> {
    const buildFile = await parseBuildFileFromPath(filePath);
    this.checkBuildFile(buildFile);
    this.logger?.info(`Loaded build file: ${filePath} (${buildFile.targets.length} targets)`);
    return buildFile;
  }

  /**
   * ビルドファイルを解析し、アクションと Provider を生成する
   * keepGoing でなければ最初の失敗を送出する
   */
  analyze(buildFile: BuildFile, options: AnalyzeOptions = {}): AnalysisResult {
    this.checkBuildFile(buildFile);

    const registry = new ActionRegistry();
    const providers = new Map<Label, TargetProviders>();
    const byName = new Map<string, TargetProviders>();
    const failures: TargetFailure[] = [];

    for (const target of orderTargets(buildFile.targets)) {
      const ctx = new ActionContext({
        pkg: buildFile.package,
        name: target.name,
        registry,
        ...(this.binDir !== undefined && { binDir: this.binDir }),
      });

      try {
        const result = this.analyzeTarget(ctx, target, byName);
        providers.set(ctx.label, result);
        byName.set(target.name, result);
        this.logger?.info(
          `Analyzed ${ctx.label} (${registry.getActionsFor(ctx.label).length} action)`
        );
      } catch (error) {
        if (!options.keepGoing) {
          throw error;
        }
        const failure = toFailure(ctx.label, error);
        failures.push(failure);
        this.logger?.error(`Analysis of ${ctx.label} failed: ${failure.message}`);
      }
    }

    return {
      package: buildFile.package,
      actions: registry.getActions(),
      providers,
      failures,
    };
  }

  /**
   * 単一の ir_verilog ターゲットを解析する
   */
  planCodegen(params: PlanCodegenParams): AnalysisResult {
    return this.analyze({
      package: params.pkg ?? "",
      targets: [{ kind: "ir_verilog", ...params.target }],
    });
  }

  /**
   * 解析結果のファイル書き出しアクションを実行する
   * @returns 書き出したファイルのパス
   */
  async materialize(result: AnalysisResult, execRoot: string): Promise<string[]> {
    const written = await materializeUseCase(result.actions, execRoot);
    for (const file of written) {
      this.logger?.info(`Wrote ${file}`);
    }
    return written;
  }

  private analyzeTarget(
    ctx: ActionContext,
    target: Target,
    analyzed: ReadonlyMap<string, TargetProviders>
  ): TargetProviders {
    if (target.kind === "ir_verilog") {
      return analyzeIrVerilog(ctx, target, this.toolchain);
    }

    const dependency = analyzed.get(target.verilog_target);
    if (!dependency) {
      throw new BuildRuleError(
        `Dependency '${target.verilog_target}' of '${target.name}' failed to analyze`,
        "DEPENDENCY_FAILED",
        { target: target.verilog_target }
      );
    }
    return analyzeBenchmarkVerilog(ctx, target, dependency, this.toolchain);
  }
}
