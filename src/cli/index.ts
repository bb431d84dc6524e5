import { Command } from '@commander-js/extra-typings';
import { initCommand } from './commands/init.js';
import { generateCommand } from './commands/generate.js';
import { runCommand } from './commands/run.js';
import { statsCommand } from './commands/stats.js';
import { analyzeCommand } from './commands/analyze.js';
import { memoryCommand } from './commands/memory.js';
import { configCommand } from './commands/config.js';
import { isLogLevel, setLogLevel } from '../utils/logger.js';

export const program = new Command()
  .name('warden')
  .description('Chat moderation loop that learns from reviewer corrections')
  .version('0.1.0')
  .option('--log-level <level>', 'debug, info, warn, error or silent')
  .hook('preAction', (thisCommand: Command<[], { logLevel?: string }>) => {
    const { logLevel } = thisCommand.opts();
    if (logLevel === undefined) return;
    if (!isLogLevel(logLevel)) {
      thisCommand.error(`Unknown log level "${logLevel}"`);
    }
    setLogLevel(logLevel);
  });

// Initialize a new project
program
  .command('init')
  .description('Initialize chatwarden in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('-s, --sample [count]', 'Also write a synthetic event dataset')
  .action(initCommand);

// Synthetic dataset
program
  .command('generate')
  .description('Write a synthetic event dataset')
  .option('-c, --count <n>', 'Number of events', '50')
  .option('-o, --output <path>', 'Where to write (defaults to loop.dataPath)')
  .action(generateCommand);

// The moderation loop
program
  .command('run')
  .description('Process events through proposer, reviewer and memory')
  .option('-m, --max <n>', 'Process at most n events')
  .option('--mode <mode>', 'review (reviewer validates) or compare (reference decides independently)')
  .option('--baseline', 'State-blind proposer with retrieval off')
  .option('-d, --data <path>', 'Event dataset to read')
  .option('-v, --verbose', 'Print every decision')
  .action(runCommand);

// Ledger inspection
program
  .command('stats')
  .argument('[subject]', 'Show one subject in detail')
  .description('Show per-subject moderation history')
  .option('-t, --top <n>', 'Rows to show', '20')
  .action(statsCommand);

// Log analysis
program
  .command('analyze')
  .description('Summarise an event log')
  .option('-l, --log <path>', 'Event log to read (defaults to loop.logPath)')
  .option('-o, --output <path>', 'Also write the metrics as JSON')
  .action(analyzeCommand);

program.addCommand(memoryCommand);
program.addCommand(configCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
