/**
 * ビルドファイル バリデーター
 * パッケージパス、ターゲットの一意性と参照整合性を検証する
 * @see src/types/target.ts の Law コメント
 */

import type {
  BuildFile,
  BuildFileValidationError,
  BuildFileValidationErrorCode,
  BuildFileValidationResult,
} from "../types/index.js";
import { findPackagePathProblem } from "../actions/path.js";

/**
 * ターゲット名に使える文字
 */
const TARGET_NAME_PATTERN = /^[A-Za-z0-9_.+-]+$/;

/**
 * "." や ".." のようにドットだけの名前
 */
const DOTS_ONLY_PATTERN = /^\.+$/;

/**
 * ビルドファイルをバリデーションする
 * @param buildFile - バリデーション対象の BuildFile
 * @returns バリデーション結果
 */
export function validateBuildFile(buildFile: BuildFile): BuildFileValidationResult {
  const errors: BuildFileValidationError[] = [];
  const targetKinds = new Map(buildFile.targets.map((t) => [t.name, t.kind]));

  const packageProblem = findPackagePathProblem(buildFile.package);
  if (packageProblem !== undefined) {
    errors.push(
      createError(
        "INVALID_PACKAGE",
        `${packageProblem}: package '${buildFile.package}'`,
        "/package"
      )
    );
  }

  validateUniqueness(buildFile, errors);

  buildFile.targets.forEach((target, index) => {
    const basePath = `/targets/${index}`;

    if (!TARGET_NAME_PATTERN.test(target.name)) {
      errors.push(
        createError(
          "INVALID_TARGET_NAME",
          `Target name '${target.name}' contains invalid characters`,
          `${basePath}/name`
        )
      );
    } else if (DOTS_ONLY_PATTERN.test(target.name)) {
      errors.push(
        createError(
          "INVALID_TARGET_NAME",
          `Target name '${target.name}' must not consist only of dots`,
          `${basePath}/name`
        )
      );
    }

    if (target.kind === "ir_verilog") {
      return;
    }

    // verilog_target の参照検証
    const referencedKind = targetKinds.get(target.verilog_target);
    if (referencedKind === undefined) {
      errors.push(
        createError(
          "UNKNOWN_VERILOG_TARGET",
          `Target '${target.name}' references undefined target '${target.verilog_target}'`,
          `${basePath}/verilog_target`
        )
      );
    } else if (referencedKind !== "ir_verilog") {
      errors.push(
        createError(
          "INVALID_VERILOG_TARGET_KIND",
          `Target '${target.verilog_target}' referenced by '${target.name}' is not an ir_verilog target`,
          `${basePath}/verilog_target`
        )
      );
    }
  });

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * ターゲット名の一意性の検証
 */
function validateUniqueness(
  buildFile: BuildFile,
  errors: BuildFileValidationError[]
): void {
  const targetNames = new Map<string, number[]>();
  buildFile.targets.forEach((target, index) => {
    const indices = targetNames.get(target.name) ?? [];
    indices.push(index);
    targetNames.set(target.name, indices);
  });
  targetNames.forEach((indices, name) => {
    if (indices.length > 1) {
      errors.push(
        createError(
          "DUPLICATE_TARGET_NAME",
          `Duplicate target name '${name}' at indices ${indices.join(", ")}`,
          `/targets/${indices[1]}/name`
        )
      );
    }
  });
}

/**
 * エラーオブジェクト生成ヘルパー
 */
function createError(
  code: BuildFileValidationErrorCode,
  message: string,
  path?: string
): BuildFileValidationError {
  const error: BuildFileValidationError = { code, message };
  if (path !== undefined) {
    error.path = path;
  }
  return error;
}
