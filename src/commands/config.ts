import { Command } from 'commander';
import type { DepprobeConfig } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { ValidationError } from '../utils/errors.js';
import { configManager, parseConfigValue, isConfigKey } from '../core/config.js';

function requireKey(key: string): keyof DepprobeConfig {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown configuration key '${key}'`);
  }
  return key;
}

function printValue(value: unknown): void {
  console.log(typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * Setup the 'depprobe config' command
 */
export function setupConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show or change settings in ~/.depprobe/config.jsonc');

  config
    .command('list')
    .description('Print the whole configuration')
    .action(
      withErrorHandling(async () => {
        console.log(JSON.stringify(await configManager.getAll(), null, 2));
      })
    );

  config
    .command('get')
    .argument('<key>', 'configuration key')
    .description('Print one configuration value')
    .action(
      withErrorHandling(async (key: string) => {
        printValue(await configManager.get(requireKey(key)));
      })
    );

  config
    .command('set')
    .argument('<key>', 'configuration key')
    .argument('<value>', 'new value; lists are comma-separated')
    .description('Change one configuration value')
    .action(
      withErrorHandling(async (key: string, value: string) => {
        const parsed = parseConfigValue(requireKey(key), value);
        await configManager.update(parsed);
        console.log(`Configuration updated: ${key}`);
      })
    );

  config
    .command('path')
    .description('Print the configuration file path')
    .action(
      withErrorHandling(async () => {
        console.log(await configManager.getConfigFilePath());
      })
    );
}
