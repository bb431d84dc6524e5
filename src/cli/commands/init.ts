import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { initProject, loadConfig, resolveProjectPath } from '../../config/index.js';
import { synthesizeEvents } from '../../core/dataset.js';
import { success } from '../ui.js';

interface InitOptions {
  force?: boolean;
  sample?: string | boolean;   // `--sample` alone or `--sample <count>`
}

const DEFAULT_SAMPLE_SIZE = 50;

function sampleSize(option: string | boolean): number {
  if (option === true) return DEFAULT_SAMPLE_SIZE;
  const count = Number(option);
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error(`Sample size must be a positive integer, got "${String(option)}"`);
  }
  return count;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();

  try {
    const wardenPath = initProject(cwd, options.force ?? false);
    console.log(success(`Initialized chatwarden in ${path.relative(cwd, wardenPath) || wardenPath}`));

    if (options.sample) {
      const config = loadConfig(cwd);
      const dataPath = resolveProjectPath(config.loop.dataPath, cwd);
      const events = synthesizeEvents(sampleSize(options.sample));
      fs.writeFileSync(dataPath, JSON.stringify(events, null, 2), 'utf-8');
      console.log(success(`Wrote ${events.length} sample events to ${path.relative(cwd, dataPath)}`));
    }

    console.log();
    console.log(chalk.gray('Next steps:'));
    console.log(chalk.gray(`  ${chalk.cyan('warden run')}       process the event dataset`));
    console.log(chalk.gray(`  ${chalk.cyan('warden analyze')}   summarise the event log`));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
