/**
 * hdl-rules CLI の引数解析
 *
 * 受け付けるオプションは固定。--build のみ繰り返し可、--keep-going のみ真偽値
 */

export interface CliOptions {
  /** ビルドファイル（serve 以外は1つだけ） */
  build: string[];
  keepGoing: boolean;
  toolchain?: string;
  binDir?: string;
  outDir?: string;
  /** codegen 引数の JSON */
  args?: string;
  verilogFile?: string;
}

export interface CliInvocation {
  command?: string;
  options: CliOptions;
  positionals: string[];
}

export class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CliError";
  }
}

type SingleValueKey = "toolchain" | "binDir" | "outDir" | "args" | "verilogFile";

const SINGLE_VALUE_OPTIONS = new Map<string, SingleValueKey>([
  ["toolchain", "toolchain"],
  ["bin-dir", "binDir"],
  ["out-dir", "outDir"],
  ["args", "args"],
  ["verilog-file", "verilogFile"],
]);

function invalidInput(message: string): CliError {
  return new CliError("INVALID_INPUT", message);
}

function parseKeepGoing(value: string): boolean {
  const normalized = value.toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw invalidInput("--keep-going must be true or false");
}

/**
 * argv を解析する
 * 値は --name=value と --name value のどちらでも指定できる。単一値のオプションは後勝ち
 * @throws CliError - 未知のオプション・値の欠落
 */
export function parseCliArgs(argv: readonly string[]): CliInvocation {
  const options: CliOptions = { build: [], keepGoing: false };
  const positionals: string[] = [];
  let command: string | undefined;

  let index = 0;
  const first = argv[0];
  if (first !== undefined && !first.startsWith("-")) {
    command = first;
    index = 1;
  }

  while (index < argv.length) {
    const arg = argv[index] ?? "";
    index++;

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    const name = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
    const inlineValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);

    if (name === "keep-going") {
      options.keepGoing = inlineValue === undefined ? true : parseKeepGoing(inlineValue);
      continue;
    }

    const key = SINGLE_VALUE_OPTIONS.get(name);
    if (name !== "build" && key === undefined) {
      throw invalidInput(`Unknown option: --${name}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = argv[index];
      if (next === undefined || next.startsWith("--")) {
        throw invalidInput(`--${name} requires a value`);
      }
      value = next;
      index++;
    }

    if (key === undefined) {
      options.build.push(value);
    } else {
      options[key] = value;
    }
  }

  return {
    options,
    positionals,
    ...(command !== undefined && { command }),
  };
}

/**
 * plan / write-scripts 用に --build を1つだけ取り出す
 */
export function requireSingleBuildFile(options: CliOptions): string {
  const [buildFile, ...rest] = options.build;
  if (buildFile === undefined || buildFile === "") {
    throw invalidInput("--build is required");
  }
  if (rest.length > 0) {
    throw invalidInput("--build accepts a single file for this command");
  }
  return buildFile;
}

/**
 * --args の JSON オブジェクト（値はすべて文字列）をパースする
 */
export function parseStringRecord(value: string, label: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new CliError(
      "INVALID_INPUT",
      `${label} must be valid JSON`,
      error instanceof Error ? { reason: error.message } : undefined
    );
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw invalidInput(`${label} must be a JSON object`);
  }

  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (typeof entry !== "string") {
      throw invalidInput(`${label}.${key} must be a string`);
    }
    record[key] = entry;
  }
  return record;
}
