import chalk from 'chalk';
import { findProjectRoot, loadConfig, resolveProjectPath } from '../../config/index.js';
import { SubjectLedger } from '../../state/ledger.js';
import type { SubjectStats } from '../../state/ledger.js';
import { dim, header, keyValue, table } from '../ui.js';

interface StatsOptions {
  top: string;
}

function printSubject(stats: SubjectStats): void {
  console.log(header(`Subject ${stats.subjectId}`));
  console.log(keyValue('Bans', String(stats.banCount)));
  console.log(keyValue('Warnings', String(stats.warningCount)));
  console.log(keyValue('Timeouts', String(stats.timeoutCount)));
  console.log(keyValue('Deleted comments', String(stats.deletedCount)));
  console.log(keyValue('Replies', String(stats.replyCount)));
  console.log(keyValue('Followers', String(stats.followerCount)));
  console.log(keyValue('Viewers', String(stats.viewerCount)));
  if (stats.currentTopic) console.log(keyValue('Topic', stats.currentTopic));
  console.log(keyValue('Last action', stats.lastAction ?? dim('none')));
}

function severity(stats: SubjectStats): number {
  return stats.banCount * 100 + stats.timeoutCount * 10 + stats.warningCount * 3 + stats.deletedCount;
}

export async function statsCommand(subject: string | undefined, options: StatsOptions): Promise<void> {
  try {
    const root = findProjectRoot();
    if (!root) {
      throw new Error('Not in a chatwarden project. Run `warden init` first.');
    }

    const ledger = new SubjectLedger();
    ledger.load(resolveProjectPath(loadConfig(root).loop.statePath, root));

    if (subject) {
      if (!ledger.has(subject)) {
        throw new Error(`No history for subject ${subject}`);
      }
      printSubject(ledger.getFullStats(subject));
      return;
    }

    const all = Object.values(ledger.getAllStats());
    if (all.length === 0) {
      console.log(dim('No subjects recorded yet. Run `warden run` first.'));
      return;
    }

    const limit = Number(options.top);
    const rows = all
      .sort((a, b) => severity(b) - severity(a))
      .slice(0, Number.isInteger(limit) && limit > 0 ? limit : all.length)
      .map((s) => [
        s.subjectId,
        String(s.banCount),
        String(s.timeoutCount),
        String(s.warningCount),
        String(s.deletedCount),
        String(s.replyCount),
        s.lastAction ?? '-',
      ]);

    console.log(table(['Subject', 'Bans', 'Timeouts', 'Warnings', 'Deleted', 'Replies', 'Last action'], rows));
    console.log();
    console.log(dim(`${all.length} subjects`));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
