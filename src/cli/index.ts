import { Command, Option } from '@commander-js/extra-typings';
import { createCategorizeCommand } from './commands/categorize.js';
import { createConfigCommand } from './commands/config.js';
import { serveCommand } from './commands/serve.js';
import { SERVER_VERSION } from '../mcp/server.js';

export function createProgram() {
  const program = new Command()
    .name('tagged-memory')
    .description('Categorized per-user memory, served over MCP')
    .version(SERVER_VERSION);

  // Run the MCP server (default when no command is given)
  program
    .command('serve', { isDefault: true })
    .description('Start the MCP server')
    .addOption(new Option('-t, --transport <transport>', 'Transport to listen on').choices(['stdio', 'http'] as const))
    .option('-p, --port <port>', 'Port for the HTTP transport (default 8181)')
    .option('--host <host>', 'Host for the HTTP transport (default 127.0.0.1)')
    .option('-d, --debug', 'Log every request to stderr')
    .option('-c, --config <path>', 'JSON config file (default .tagged-memory.json)')
    .action(serveCommand);

  // Preview a category without starting the server
  program.addCommand(createCategorizeCommand());
  program.addCommand(createConfigCommand());

  return program;
}

export const program = createProgram();
