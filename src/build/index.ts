/**
 * Build モジュール
 * ビルドファイルの YAML パースとバリデーション
 */

export { parseBuildFile, parseBuildFileFromPath, BuildFileParseError } from "./parser.js";
export { validateBuildFile } from "./validator.js";
