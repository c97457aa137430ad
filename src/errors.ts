/**
 * ビルドルールのエラー定義
 *
 * いずれも解析（アクション構築）時点で致命的。リトライもローカルでの回復もしない。
 * 対象ターゲットのアクションが登録される前に送出される
 */

/**
 * エラーコード
 */
export type BuildRuleErrorCode =
  | "UNKNOWN_OPTION"
  | "BAD_EXTENSION"
  | "MISSING_TOP"
  | "TOOL_RESOLUTION"
  | "MISSING_OUTPUT"
  | "UNPRODUCED_OUTPUT"
  | "ACTION_CONFLICT"
  | "DUPLICATE_OUTPUT"
  | "DEPENDENCY_FAILED"
  | "INVALID_BUILD_FILE";

/**
 * エラーの詳細情報
 * エラーコードに応じた構造化データを保持
 */
export interface BuildRuleErrorDetails {
  /** UNKNOWN_OPTION 時: 許可されていないキー */
  key?: string;
  /** BAD_EXTENSION / *_OUTPUT / ACTION_CONFLICT 時: 対象ファイル */
  filename?: string;
  /** BAD_EXTENSION 時: 期待した拡張子 */
  expectedExtension?: string;
  /** MISSING_TOP / DEPENDENCY_FAILED 時: 上流ターゲット名 */
  target?: string;
  /** TOOL_RESOLUTION 時: ツール名 */
  tool?: string;
  /** INVALID_BUILD_FILE 時: 検証エラー */
  errors?: unknown[];
}

/**
 * ビルドルールエラーの基底クラス
 */
export class BuildRuleError extends Error {
  constructor(
    message: string,
    public readonly code: BuildRuleErrorCode,
    public readonly details?: BuildRuleErrorDetails,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "BuildRuleError";
  }
}

/**
 * 許可リスト外の codegen 引数
 */
export class UnknownOptionError extends BuildRuleError {
  constructor(public readonly key: string) {
    super(`Unrecognized codegen argument: '${key}'`, "UNKNOWN_OPTION", { key });
    this.name = "UnknownOptionError";
  }
}

/**
 * Verilog ファイル名の拡張子がモードと一致しない
 */
export class BadExtensionError extends BuildRuleError {
  constructor(
    public readonly filename: string,
    public readonly expectedExtension: string,
    useSystemVerilog: boolean
  ) {
    super(
      `${useSystemVerilog ? "SystemVerilog" : "Verilog"} filename must contain the '${expectedExtension}' extension: ${filename}`,
      "BAD_EXTENSION",
      { filename, expectedExtension }
    );
    this.name = "BadExtensionError";
  }
}

/**
 * 計測対象の CodegenInfo に top がない
 */
export class MissingTopError extends BuildRuleError {
  constructor(public readonly target: string) {
    super(
      `Verilog target '${target}' does not provide a top value`,
      "MISSING_TOP",
      { target }
    );
    this.name = "MissingTopError";
  }
}

/**
 * ツールチェーンから実行ファイルを解決できない
 */
export class ToolResolutionError extends BuildRuleError {
  constructor(public readonly tool: string, reason: string) {
    super(`Cannot resolve tool '${tool}': ${reason}`, "TOOL_RESOLUTION", { tool });
    this.name = "ToolResolutionError";
  }
}

/**
 * 必須の出力ファイル名が指定されていない
 */
export class MissingOutputError extends BuildRuleError {
  constructor(attribute: string) {
    super(`Output '${attribute}' is required`, "MISSING_OUTPUT", {
      filename: attribute,
    });
    this.name = "MissingOutputError";
  }
}

/**
 * 明示された出力をどのアクションも生成しない
 */
export class UnproducedOutputError extends BuildRuleError {
  constructor(attribute: string, filename: string, reason: string) {
    super(
      `Output '${attribute}' (${filename}) is never produced: ${reason}`,
      "UNPRODUCED_OUTPUT",
      { filename }
    );
    this.name = "UnproducedOutputError";
  }
}

/**
 * 同一ターゲット内で同じファイルを二重に宣言した
 */
export class DuplicateOutputError extends BuildRuleError {
  constructor(filename: string) {
    super(`File '${filename}' is declared more than once`, "DUPLICATE_OUTPUT", {
      filename,
    });
    this.name = "DuplicateOutputError";
  }
}

/**
 * 複数のアクションが同じ出力を生成しようとした
 */
export class ActionConflictError extends BuildRuleError {
  constructor(filename: string, owner: string, existingOwner: string) {
    super(
      `Output '${filename}' of ${owner} is already generated by ${existingOwner}`,
      "ACTION_CONFLICT",
      { filename, target: existingOwner }
    );
    this.name = "ActionConflictError";
  }
}
