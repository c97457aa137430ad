/**
 * stderr へのログ出力
 * HDL_RULES_SILENT=1 またはテスト実行時は出力しない
 */

export interface Logger {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isSilent(): boolean {
  return process.env.HDL_RULES_SILENT === "1" || process.env.NODE_ENV === "test";
}

/**
 * ロガーを作成
 * stdout は JSON 出力・MCP transport 用のため、ログは常に stderr に出す
 */
export function createLogger(prefix = "[hdl-rules]"): Logger {
  const silent = isSilent();
  return {
    info: (...args: unknown[]) => {
      if (!silent) {
        console.error(prefix, ...args);
      }
    },
    error: (...args: unknown[]) => {
      if (!silent) {
        console.error(prefix, ...args);
      }
    },
  };
}
