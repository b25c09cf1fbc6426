import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { ConfigError } from '../../errors.js';
import { getConfigValue, resolveConfig, CONFIG_FILE } from '../../config/index.js';
import { error } from '../ui.js';

// tagged-memory config [key]
export function createConfigCommand() {
  return new Command('config')
    .argument('[key]', 'Config key (e.g., server.port)')
    .option('-c, --config <path>', `JSON config file (default ${CONFIG_FILE})`)
    .description('Print the configuration the server would start with')
    .action((key, options) => {
      try {
        const config = resolveConfig({ configPath: options.config });

        if (!key) {
          printConfigTree(config, '');
          return;
        }

        const value = getConfigValue(config, key);
        if (value === undefined) {
          console.error(error(`Unknown config key: ${key}`));
          process.exitCode = 1;
          return;
        }
        console.log(formatValue(value));
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error(error(err.message));
        process.exitCode = 1;
      }
    });
}

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function printConfigTree(obj: object, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${formatValue(value)}`);
    }
  }
}
