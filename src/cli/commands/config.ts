/**
 * Config Command
 *
 * Manages ~/.ragline/config.toml via CLI:
 *   ragline config get <key>         - Get a specific value
 *   ragline config set <key> <value> - Set a value
 *   ragline config list              - Show all configuration
 *   ragline config path              - Show config file location
 *   ragline config reset --force     - Restore defaults
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { CLIError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // ragline config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., ragline config get completion.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        throw new CLIError(
          `Unknown config key: ${key}`,
          'Run: ragline config list  to see all available keys'
        );
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // ragline config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., ragline config set web_search.num_results 5)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (getConfigValue(key) === undefined) {
        throw new CLIError(
          `Unknown config key: ${key}`,
          'Run: ragline config list  to see all available keys'
        );
      }

      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  // ragline config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by section for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';

        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }

        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  // ragline config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // ragline config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      resetConfig();
      // Writes a fresh template
      loadConfig(true);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
