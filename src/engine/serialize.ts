/**
 * 解析結果の JSON 表現
 * CLI と MCP Server の出力で共有する
 */

import type { BuildAction, TargetProviders } from "../types/index.js";
import type { AnalysisResult, TargetFailure } from "./build-planner.js";

export interface AnalysisJson {
  package: string;
  actions: BuildAction[];
  /** ラベル → Provider */
  providers: Record<string, TargetProviders>;
  failures: TargetFailure[];
}

export function toAnalysisJson(result: AnalysisResult): AnalysisJson {
  return {
    package: result.package,
    actions: [...result.actions],
    providers: Object.fromEntries(result.providers),
    failures: result.failures,
  };
}
