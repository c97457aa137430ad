/**
 * Action Registry
 * 登録されたビルドアクションのインメモリ管理
 *
 * @law 出力ファイル（path）を生成するアクションは高々1つ
 */

import type { BuildAction, FileHandle, Label } from "../types/index.js";
import { ActionConflictError, DuplicateOutputError } from "../errors.js";

/**
 * アクションの出力ファイル一覧
 */
export function getActionOutputs(action: BuildAction): FileHandle[] {
  return action.kind === "run_shell" ? action.outputs : [action.output];
}

export class ActionRegistry {
  private readonly actions: BuildAction[] = [];
  private readonly producers: Map<string, Label> = new Map();

  /**
   * アクションを登録
   * 出力が既存のアクションと衝突する場合は何も登録しない
   * @throws DuplicateOutputError - 1つのアクションが同じ出力を重複して持つ場合
   * @throws ActionConflictError
   */
  register(action: BuildAction): void {
    const outputs = getActionOutputs(action);
    const paths = new Set<string>();
    for (const output of outputs) {
      if (paths.has(output.path)) {
        throw new DuplicateOutputError(output.path);
      }
      paths.add(output.path);
    }
    for (const output of outputs) {
      const existing = this.producers.get(output.path);
      if (existing !== undefined) {
        throw new ActionConflictError(output.path, action.owner, existing);
      }
    }

    for (const output of outputs) {
      this.producers.set(output.path, action.owner);
    }
    this.actions.push(action);
  }

  /**
   * 登録順のアクション一覧
   */
  getActions(): readonly BuildAction[] {
    return this.actions;
  }

  /**
   * 指定ターゲットが登録したアクション
   */
  getActionsFor(owner: Label): BuildAction[] {
    return this.actions.filter((action) => action.owner === owner);
  }

  /**
   * ファイルを生成するターゲット
   */
  getProducer(path: string): Label | undefined {
    return this.producers.get(path);
  }

  get size(): number {
    return this.actions.length;
  }
}
