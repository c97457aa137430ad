/**
 * 共通の型定義
 * 循環参照を避けるため、複数モジュールで使用される型をここに配置
 */

/**
 * ターゲットのラベル
 *
 * @law 形式: //{package}:{name}（例: //designs/adder:adder_verilog）
 * @grounding formatLabel() で生成
 */
export type Label = `//${string}:${string}`;

/**
 * codegen 引数（フラグ名 → 値）
 * 値はすべて文字列。挿入順序は出力に影響しない
 */
export type CodegenArgs = Readonly<Record<string, string>>;

/**
 * パッケージとターゲット名からラベルを生成
 */
export function formatLabel(pkg: string, name: string): Label {
  return `//${pkg}:${name}`;
}
