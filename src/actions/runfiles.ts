/**
 * Runfiles の合成
 */

import type { FileHandle, Runfiles } from "../types/index.js";

/**
 * ファイル集合を path で重複排除して結合する（先勝ち）
 */
export function mergeFiles(
  ...groups: ReadonlyArray<readonly FileHandle[]>
): FileHandle[] {
  const seen = new Set<string>();
  const merged: FileHandle[] = [];
  for (const group of groups) {
    for (const file of group) {
      if (!seen.has(file.path)) {
        seen.add(file.path);
        merged.push(file);
      }
    }
  }
  return merged;
}

/**
 * 直接のファイルとツールの runfiles を結合する
 * @param toolRunfiles - ツールの runfiles
 * @param files - 直接必要なファイル（先頭に並ぶ）
 */
export function mergeRunfiles(
  toolRunfiles: readonly Runfiles[],
  files: readonly FileHandle[]
): Runfiles {
  return {
    files: mergeFiles(files, ...toolRunfiles.map((r) => r.files)),
  };
}
