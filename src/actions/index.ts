/**
 * Actions モジュール
 * ホストビルドシステムのファイル宣言・アクション登録
 */

export { ActionContext, DEFAULT_BIN_DIR } from "./action-context.js";
export type { ActionContextOptions, RunShellParams, WriteParams } from "./action-context.js";
export { ActionRegistry, getActionOutputs } from "./action-registry.js";
export { mergeFiles, mergeRunfiles } from "./runfiles.js";
export { ArtifactPathError, validateArtifactPath, joinPath } from "./path.js";
