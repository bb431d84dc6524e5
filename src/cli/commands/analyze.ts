import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { findProjectRoot, loadConfig, resolveProjectPath } from '../../config/index.js';
import { analyzeLog } from '../../core/analysis.js';
import { dim, header, keyValue, percent, success, table, warning } from '../ui.js';

interface AnalyzeOptions {
  log?: string;
  output?: string;
}

function defaultLogPath(): string {
  const root = findProjectRoot();
  if (!root) {
    throw new Error('Not in a chatwarden project. Run `warden init` first or pass --log.');
  }
  return resolveProjectPath(loadConfig(root).loop.logPath, root);
}

export async function analyzeCommand(options: AnalyzeOptions): Promise<void> {
  try {
    const logPath = options.log ? path.resolve(options.log) : defaultLogPath();
    const metrics = analyzeLog(logPath);

    if (!metrics) {
      console.log(warning('No events found in log file.'));
      return;
    }

    console.log(header('Analysis'));
    console.log(keyValue('Total events', String(metrics.totalEvents)));
    console.log(keyValue('Disagreements', String(metrics.disagreements)));
    if (metrics.reviewFailures > 0) {
      console.log(keyValue('Review failures', String(metrics.reviewFailures)));
    }
    console.log(keyValue('Agreement rate', percent(metrics.agreementRate)));
    console.log(keyValue('Final agreement', metrics.agreementOverTime.length > 0 ? percent(metrics.finalAgreementRate) : dim('n/a')));
    console.log(keyValue('Memory growth', String(metrics.memoryGrowth)));
    console.log(keyValue('Final memory', String(metrics.finalMemorySize)));
    console.log(keyValue('Total cost', `$${metrics.totalCost.toFixed(4)}`));
    console.log(keyValue('Model calls', String(metrics.totalCalls)));
    console.log(keyValue('Cost per event', `$${metrics.avgCostPerEvent.toFixed(6)}`));

    const actions = Object.entries(metrics.actionDistribution).sort((a, b) => b[1] - a[1]);
    if (actions.length > 0) {
      console.log();
      console.log(table(['Action', 'Count'], actions.map(([action, count]) => [action, String(count)])));
    }

    if (options.output) {
      const outputPath = path.resolve(options.output);
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(outputPath, JSON.stringify(metrics, null, 2), 'utf-8');
      console.log();
      console.log(success(`Results saved to ${outputPath}`));
    }
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
