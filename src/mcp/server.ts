/**
 * Tagged Memory MCP Server
 *
 * Exposes the six memory operations as MCP tools and a usage guide as a
 * resource. One MemoryOperations instance (and so one store) may back many
 * servers, e.g. one per HTTP session.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { MemoryOperations } from '../memory/operations.js';
import { formatResult, preview } from './format.js';
import { GUIDE_TEXT, GUIDE_URI } from './guide.js';
import { TOOLS, operationForTool, toOperationArgs } from './tools.js';

export const SERVER_NAME = 'tagged-memory';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(operations: MemoryOperations, logger: Logger = silentLogger): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const operation = operationForTool(name);
    if (!operation) {
      logger.warn(`Unknown tool: ${name}`);
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    const result = operations.invoke(operation, toOperationArgs(args));
    const text = formatResult(result);

    if (!result.ok) {
      logger.debug(`${name} rejected: ${result.error.message}`);
      return {
        content: [{ type: 'text', text }],
        isError: true,
      };
    }

    if (result.operation === 'save') {
      logger.debug(`Saved ${result.value.id} [${result.value.category}]: ${preview(result.value.content, 50)}`);
    } else {
      logger.debug(`${name} ok`);
    }

    return {
      content: [{ type: 'text', text }],
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: GUIDE_URI,
        name: 'Tagged memory guide',
        description: 'How categories and the memory tools work',
        mimeType: 'text/plain',
      },
    ],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    if (uri !== GUIDE_URI) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: 'text/plain', text: GUIDE_TEXT }],
    };
  });

  return server;
}

export interface RunningServer {
  close(): Promise<void>;
}

export async function runStdioServer(
  operations: MemoryOperations,
  logger: Logger = silentLogger
): Promise<RunningServer> {
  const server = createMcpServer(operations, logger);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.debug('Listening on stdio');

  return {
    close: () => server.close(),
  };
}
