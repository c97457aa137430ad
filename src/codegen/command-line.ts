/**
 * コマンドライン組み立て
 * 型付きの要素を蓄積し、最後に一度だけ文字列化する
 */

import type { CodegenArgs } from "../types/index.js";

/**
 * コマンドラインの要素
 */
export type CommandPart =
  | { type: "arg"; value: string }
  | { type: "flag"; name: string; value: string };

export class CommandLine {
  private readonly parts: CommandPart[] = [];

  /**
   * 位置引数を追加
   */
  addArg(value: string): this {
    this.parts.push({ type: "arg", value });
    return this;
  }

  /**
   * --name=value 形式のフラグを追加
   */
  addFlag(name: string, value: string): this {
    this.parts.push({ type: "flag", name, value });
    return this;
  }

  /**
   * 値がある場合のみフラグを追加
   */
  addOptionalFlag(name: string, value: string | undefined): this {
    if (value) {
      this.addFlag(name, value);
    }
    return this;
  }

  /**
   * 引数をキー順に並べてフラグとして追加
   * 挿入順序に依存しない出力にする
   */
  addArgsAsFlags(args: CodegenArgs): this {
    const keys = Object.keys(args).sort();
    for (const key of keys) {
      const value = args[key];
      if (value !== undefined) {
        this.addFlag(key, value);
      }
    }
    return this;
  }

  getParts(): readonly CommandPart[] {
    return this.parts;
  }

  toString(): string {
    return this.parts
      .map((part) =>
        part.type === "arg" ? part.value : `--${part.name}=${part.value}`
      )
      .join(" ");
  }
}
