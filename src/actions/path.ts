/**
 * 宣言ファイルのパス検証
 *
 * @law 検証済みのパスは正規形（"." / ".." / 空要素を含まない）
 *      文字列が等しい ⇔ 同じファイル
 */

import * as path from "node:path";

/**
 * アーティファクトパス検証エラー
 */
export class ArtifactPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArtifactPathError";
  }
}

/**
 * 相対パスとして不正な理由を返す（正常なら undefined）
 */
function findRelativePathProblem(value: string): string | undefined {
  // 絶対パス防止（/ で始まるパス、Windows ドライブ指定を拒否）
  if (value.startsWith("/") || /^[A-Za-z]:/.test(value)) {
    return "Absolute path not allowed";
  }

  const segments = value.split("/");
  // パストラバーサル防止
  if (segments.includes("..")) {
    return "Path traversal detected";
  }
  if (segments.some((segment) => segment === "." || segment === "")) {
    return "Non-canonical path";
  }
  return undefined;
}

/**
 * パッケージ相対のファイル名を検証（パストラバーサル防止）
 * @param filename - 検証対象のファイル名
 * @throws ArtifactPathError - 不正なファイル名の場合
 */
export function validateArtifactPath(filename: string): void {
  // 空パスチェック
  if (!filename || filename.trim() === "") {
    throw new ArtifactPathError("Empty artifact path");
  }

  const problem = findRelativePathProblem(filename);
  if (problem !== undefined) {
    throw new ArtifactPathError(`${problem}: ${filename}`);
  }
}

/**
 * パッケージパスの検証エラーを返す（ルートパッケージ "" は正常）
 */
export function findPackagePathProblem(pkg: string): string | undefined {
  return pkg === "" ? undefined : findRelativePathProblem(pkg);
}

/**
 * パス要素を / で連結する（空要素は除く）
 */
export function joinPath(...segments: string[]): string {
  return segments.filter((segment) => segment.length > 0).join("/");
}

/**
 * root 配下のパスに解決する
 * @throws ArtifactPathError - root の外を指す場合
 */
export function resolveInside(root: string, relativePath: string): string {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relativePath);
  const relative = path.relative(resolvedRoot, resolved);
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new ArtifactPathError(`Path escapes ${resolvedRoot}: ${relativePath}`);
  }
  return resolved;
}
