/**
 * Materialize Use Case
 * 登録済みのファイル書き出しアクションを実行ルート配下に書き出す
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BuildAction, FileWriteAction } from "../../types/index.js";
import { resolveInside } from "../../actions/path.js";

const EXECUTABLE_MODE = 0o755;
const REGULAR_MODE = 0o644;

/**
 * Materialize Use Case を実行
 * @param actions - 登録済みのアクション（run_shell は対象外）
 * @param execRoot - 書き出し先のルートディレクトリ
 * @returns 書き出したファイルのパス（execRoot 相対）
 * @throws ArtifactPathError - execRoot の外を指す出力がある場合（何も書き出さない）
 */
export async function materialize(
  actions: readonly BuildAction[],
  execRoot: string
): Promise<string[]> {
  const writes = actions.filter(
    (action): action is FileWriteAction => action.kind === "file_write"
  );

  const targets = writes.map((action) => ({
    action,
    fullPath: resolveInside(execRoot, action.output.path),
  }));

  const written: string[] = [];
  for (const { action, fullPath } of targets) {
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, action.content, "utf-8");
    await fs.chmod(fullPath, action.is_executable ? EXECUTABLE_MODE : REGULAR_MODE);
    written.push(action.output.path);
  }
  return written;
}
