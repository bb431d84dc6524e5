import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { findProjectRoot, loadConfig, resolveProjectPath } from '../../config/index.js';
import { synthesizeEvents } from '../../core/dataset.js';
import { success } from '../ui.js';

interface GenerateOptions {
  count: string;
  output?: string;
}

export async function generateCommand(options: GenerateOptions): Promise<void> {
  try {
    const count = Number(options.count);
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error(`--count must be a positive integer, got "${options.count}"`);
    }

    let outputPath: string;
    if (options.output) {
      outputPath = path.resolve(options.output);
    } else {
      const root = findProjectRoot();
      if (!root) {
        throw new Error('Not in a chatwarden project. Run `warden init` first or pass --output.');
      }
      outputPath = resolveProjectPath(loadConfig(root).loop.dataPath, root);
    }

    const events = synthesizeEvents(count);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(events, null, 2), 'utf-8');
    console.log(success(`Wrote ${events.length} events to ${outputPath}`));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
