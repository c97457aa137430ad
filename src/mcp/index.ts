/**
 * MCP モジュール
 */

export { createMcpServer, startMcpServer, codegenInfoUri } from "./server.js";
export type { McpServerConfig } from "./server.js";
