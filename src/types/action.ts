/**
 * ビルドアクションの型定義
 * ホストのビルドシステムに登録される宣言的な作業単位
 */

import type { FileHandle } from "./artifact.js";
import type { Label } from "./common.js";

/**
 * シェルコマンドを実行するアクション
 */
export interface RunShellAction {
  kind: "run_shell";
  /** アクションを登録したターゲット */
  owner: Label;
  /** ログ・集計用の短い識別子（例: Codegen） */
  mnemonic: string;
  progress_message: string;
  command: string;
  outputs: FileHandle[];
  inputs: FileHandle[];
  tools: FileHandle[];
}

/**
 * ファイルを書き出すアクション
 */
export interface FileWriteAction {
  kind: "file_write";
  owner: Label;
  output: FileHandle;
  content: string;
  is_executable: boolean;
}

export type BuildAction = RunShellAction | FileWriteAction;
