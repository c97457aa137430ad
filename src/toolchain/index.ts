/**
 * Toolchain モジュール
 */

export {
  DEFAULT_TOOLCHAIN_CONFIG_PATH,
  ToolchainConfigError,
  loadToolchainConfig,
  parseToolchainConfig,
  resolveToolchainConfigPath,
} from "./config.js";
export type { ToolchainConfig, ToolDefinition, ToolName } from "./config.js";
export { getExecutableFrom, getRunfilesFrom } from "./toolchain.js";
