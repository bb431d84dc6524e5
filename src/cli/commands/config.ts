import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  findProjectRoot,
  initProject,
} from '../../config/index.js';
import { success, warning } from '../ui.js';

export const configCommand = new Command('config')
  .description('Manage chatwarden configuration');

function requireProject(): string {
  const root = findProjectRoot();
  if (!root) {
    console.error(chalk.red('Not in a chatwarden project. Run `warden init` first.'));
    process.exit(1);
  }
  return root;
}

// warden config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., memory.topK)')
  .description('Get configuration value(s)')
  .action((key) => {
    const root = requireProject();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          console.error(chalk.red(`Unknown config key: ${key}`));
          process.exit(1);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// warden config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., reviewer.provider)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    const root = requireProject();

    try {
      setConfigValue(key, value, root);
      console.log(success(`Set ${key} = ${value}`));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// warden config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireProject();
    printConfigTree(loadConfig(root), '');
  });

// warden config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    const root = requireProject();

    if (!options.yes) {
      console.log(warning('This will reset all configuration to defaults.'));
      console.log(chalk.gray('Use --yes to skip this confirmation.'));
      return;
    }

    try {
      initProject(root, true);
      console.log(success('Configuration reset to defaults'));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

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
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}
