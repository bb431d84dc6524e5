import chalk from 'chalk';
import * as path from 'path';
import { findProjectRoot, loadConfig } from '../../config/index.js';
import type { RunMode } from '../../config/index.js';
import { loadEvents } from '../../core/dataset.js';
import { createRuntime, resolveRuntimePaths, unreachableAgents } from '../../core/runtime.js';
import type { RunReporter } from '../../core/run-context.js';
import type { EventResult, RunSummary } from '../../core/types.js';
import { dim, formatDecision, formatOutcome, header, keyValue, percent, progress, warning } from '../ui.js';

interface RunOptions {
  max?: string;
  mode?: string;
  baseline?: boolean;
  data?: string;
  verbose?: boolean;
}

function parseMode(mode: string | undefined): RunMode | undefined {
  if (mode === undefined) return undefined;
  if (mode === 'review' || mode === 'compare') return mode;
  throw new Error(`Unknown mode "${mode}". Use review or compare.`);
}

function parseMax(max: string | undefined): number | undefined {
  if (max === undefined) return undefined;
  const value = Number(max);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--max must be a positive integer, got "${max}"`);
  }
  return value;
}

function consoleReporter(total: number, reportEvery: number, verbose: boolean): RunReporter {
  let seen = 0;
  let agreements = 0;

  return {
    onEvent(result: EventResult): void {
      seen++;
      if (result.agrees === true) agreements++;

      if (verbose) {
        const verdict = result.reviewFailed
          ? chalk.red('review failed')
          : result.agrees ? chalk.green('agreed') : chalk.yellow('overridden');
        console.log(`${chalk.cyan(`#${result.seq}`)} ${chalk.bold(result.subjectId)}: ${dim(`"${result.eventText}"`)}`);
        console.log(`  proposed ${formatDecision(result.proposal)} → ${verdict}`);
        if (result.agrees === false) {
          console.log(`  effective ${formatDecision(result.effective)}`);
        }
        result.outcomes.forEach((outcome) => console.log(formatOutcome(outcome)));
      }

      if (seen % reportEvery === 0 || seen === total) {
        console.log(
          progress(seen, total, 'Events') +
          dim(` agreement ${percent(agreements / seen)} | memory ${result.memorySize} | cost $${result.costs.totalCost.toFixed(4)}`)
        );
      }
    },

    onComplete(summary: RunSummary): void {
      console.log(header('Run complete'));
      console.log(keyValue('Run', summary.runId));
      console.log(keyValue('Processed', String(summary.processed)));
      if (summary.failed > 0) {
        console.log(keyValue('Failed', chalk.red(String(summary.failed))));
      }
      console.log(keyValue('Agreements', String(summary.agreements)));
      console.log(keyValue('Disagreements', String(summary.disagreements)));
      if (summary.reviewFailures > 0) {
        console.log(keyValue('Review failures', chalk.yellow(String(summary.reviewFailures))));
      }
      console.log(keyValue('Agreement rate', percent(summary.agreementRate)));
      console.log(keyValue('Memory added', String(summary.memoryAdded)));
      console.log(keyValue('Memory size', String(summary.memorySize)));
      console.log(keyValue('Model calls', String(summary.cost.totalCalls)));
      console.log(keyValue('Total cost', `$${summary.cost.totalCost.toFixed(4)}`));
    },
  };
}

export async function runCommand(options: RunOptions): Promise<void> {
  try {
    const root = findProjectRoot();
    if (!root) {
      throw new Error('Not in a chatwarden project. Run `warden init` first.');
    }

    const config = loadConfig(root);
    const mode = parseMode(options.mode);
    const maxEvents = parseMax(options.max) ?? config.loop.maxEvents;

    // Baseline: a state-blind proposer with no retrieved corrections
    const baseline = options.baseline ?? false;

    const dataPath = options.data
      ? path.resolve(options.data)
      : resolveRuntimePaths(config, root).data;
    const events = loadEvents(dataPath);
    const total = Math.min(maxEvents, events.length);

    const runtime = await createRuntime(config, root, {
      mode,
      useState: baseline ? false : undefined,
      useRetrieval: baseline ? false : undefined,
      reporter: consoleReporter(total, config.loop.reportEvery, options.verbose ?? false),
    });

    for (const name of await unreachableAgents(runtime)) {
      console.log(warning(`${name} is not reachable; its decisions fall back to log_incident`));
    }

    console.log(chalk.bold(`Processing ${total} of ${events.length} events`) + dim(` (${mode ?? config.loop.mode} mode${baseline ? ', baseline' : ''})`));
    if (runtime.restored.records > 0 || runtime.restored.subjects > 0) {
      console.log(dim(`Restored ${runtime.restored.records} memory records and ${runtime.restored.subjects} subjects`));
    }
    console.log();

    await runtime.orchestrator.run(events, { maxEvents });
    console.log(dim(`Log: ${path.relative(process.cwd(), runtime.paths.log)}`));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
