/**
 * tagged-memory serve - run the MCP server over stdio or HTTP
 *
 * Owns the store: it is created here, shared by every session, and closed
 * on SIGINT/SIGTERM.
 */

import { resolveConfig, type Config } from '../../config/index.js';
import { ConfigError } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { MemoryOperations } from '../../memory/operations.js';
import { MemoryStore } from '../../memory/store.js';
import { startHttpServer } from '../../mcp/http.js';
import { runStdioServer, type RunningServer } from '../../mcp/server.js';
import { error } from '../ui.js';

export interface ServeOptions {
  transport?: string;
  host?: string;
  port?: string;
  debug?: boolean;
  config?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  let config: Config;
  try {
    config = resolveConfig({
      configPath: options.config,
      overrides: {
        transport: options.transport,
        host: options.host,
        port: options.port,
        debug: options.debug,
      },
    });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(error(err.message));
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ debug: config.logging.debug });
  const store = new MemoryStore();
  const operations = new MemoryOperations(store);

  let running: RunningServer;
  try {
    if (config.server.transport === 'stdio') {
      running = await runStdioServer(operations, logger);
    } else {
      const http = await startHttpServer({
        operations,
        logger,
        host: config.server.host,
        port: config.server.port,
      });
      logger.info(`Tagged memory server listening on ${http.url}`);
      logger.info(`MCP endpoint: ${http.url}/mcp`);
      running = http;
    }
  } catch (err) {
    logger.error(`Could not start server: ${err instanceof Error ? err.message : String(err)}`);
    store.close();
    process.exitCode = 1;
    return;
  }

  logger.debug(`Debug logging enabled (transport: ${config.server.transport})`);

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await running.close();
    } catch (err) {
      logger.error(`Error while closing server: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      store.close();
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}
