/**
 * MCP adapter for the memory operations, over stdio or streamable HTTP.
 */

export { createMcpServer, runStdioServer, SERVER_NAME, SERVER_VERSION } from './server.js';
export type { RunningServer } from './server.js';
export { startHttpServer, MCP_PATHS } from './http.js';
export type { HttpServerOptions, RunningHttpServer } from './http.js';
export { TOOLS, TOOL_OPERATIONS, operationForTool, toOperationArgs } from './tools.js';
export { formatResult } from './format.js';
export { GUIDE_URI, GUIDE_TEXT } from './guide.js';
