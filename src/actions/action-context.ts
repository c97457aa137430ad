/**
 * Action Context
 * 1ターゲットの解析中にファイル宣言とアクション登録を行う
 */

import type {
  FileHandle,
  FileWriteAction,
  Label,
  RunShellAction,
} from "../types/index.js";
import { formatLabel } from "../types/index.js";
import { DuplicateOutputError, UnproducedOutputError } from "../errors.js";
import type { ActionRegistry } from "./action-registry.js";
import {
  ArtifactPathError,
  findPackagePathProblem,
  joinPath,
  validateArtifactPath,
} from "./path.js";

export const DEFAULT_BIN_DIR = "hdl-out/bin";

export interface ActionContextOptions {
  /** ワークスペースルートからのパッケージパス */
  pkg: string;
  /** ターゲット名 */
  name: string;
  registry: ActionRegistry;
  /** 生成ファイルを置くディレクトリ（実行ルート相対） */
  binDir?: string;
}

export interface RunShellParams {
  outputs: FileHandle[];
  inputs: FileHandle[];
  tools: FileHandle[];
  command: string;
  mnemonic: string;
  progressMessage: string;
}

export interface WriteParams {
  output: FileHandle;
  content: string;
  isExecutable?: boolean;
}

export class ActionContext {
  readonly label: Label;
  readonly pkg: string;
  readonly name: string;
  private readonly registry: ActionRegistry;
  private readonly binDir: string;
  private readonly declared: Map<string, FileHandle> = new Map();

  /**
   * @throws ArtifactPathError - パッケージパスが不正な場合
   */
  constructor(options: ActionContextOptions) {
    const problem = findPackagePathProblem(options.pkg);
    if (problem !== undefined) {
      throw new ArtifactPathError(`${problem}: package '${options.pkg}'`);
    }
    this.pkg = options.pkg;
    this.name = options.name;
    this.label = formatLabel(options.pkg, options.name);
    this.registry = options.registry;
    this.binDir = options.binDir ?? DEFAULT_BIN_DIR;
  }

  /**
   * 生成ファイルを宣言
   * @throws ArtifactPathError - 不正なファイル名
   * @throws DuplicateOutputError - 同じファイルを二重に宣言した場合
   */
  declareFile(filename: string): FileHandle {
    validateArtifactPath(filename);
    if (this.declared.has(filename)) {
      throw new DuplicateOutputError(filename);
    }
    const file: FileHandle = {
      path: joinPath(this.binDir, this.pkg, filename),
      short_path: joinPath(this.pkg, filename),
      root: "bin",
    };
    this.declared.set(filename, file);
    return file;
  }

  /**
   * パッケージ内のソースファイルを参照
   */
  sourceFile(filename: string): FileHandle {
    validateArtifactPath(filename);
    const filePath = joinPath(this.pkg, filename);
    return { path: filePath, short_path: filePath, root: "source" };
  }

  /**
   * シェルコマンドのアクションを登録
   */
  runShell(params: RunShellParams): RunShellAction {
    const action: RunShellAction = {
      kind: "run_shell",
      owner: this.label,
      mnemonic: params.mnemonic,
      progress_message: params.progressMessage,
      command: params.command,
      outputs: params.outputs,
      inputs: params.inputs,
      tools: params.tools,
    };
    this.registry.register(action);
    return action;
  }

  /**
   * ファイル書き出しのアクションを登録
   */
  write(params: WriteParams): FileWriteAction {
    const action: FileWriteAction = {
      kind: "file_write",
      owner: this.label,
      output: params.output,
      content: params.content,
      is_executable: params.isExecutable ?? false,
    };
    this.registry.register(action);
    return action;
  }

  /**
   * 宣言したファイルがすべていずれかのアクションで生成されることを確認
   * @throws UnproducedOutputError
   */
  assertAllOutputsProduced(): void {
    for (const [filename, file] of this.declared) {
      if (this.registry.getProducer(file.path) === undefined) {
        throw new UnproducedOutputError(filename, file.path, "no action generates it");
      }
    }
  }
}
