import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { findProjectRoot, loadConfig, resolveProjectPath } from '../../config/index.js';
import { SimilarityIndex } from '../../memory/index-store.js';
import { createSimilarityBackend } from '../../memory/similarity.js';
import { dim, similarity } from '../ui.js';

export const memoryCommand = new Command('memory')
  .description('Inspect remembered reviewer corrections');

async function openIndex(): Promise<{ index: SimilarityIndex; minSimilarity: number; topK: number }> {
  const root = findProjectRoot();
  if (!root) {
    throw new Error('Not in a chatwarden project. Run `warden init` first.');
  }

  const config = loadConfig(root);
  const backend = await createSimilarityBackend({
    backend: config.memory.backend,
    embeddingProvider: config.memory.embeddingProvider,
    embeddingModel: config.memory.embeddingModel,
  });
  const index = new SimilarityIndex(backend);
  await index.load(resolveProjectPath(config.memory.persistencePath, root));

  return { index, minSimilarity: config.memory.minSimilarity, topK: config.memory.topK };
}

// warden memory list
memoryCommand
  .command('list')
  .description('List stored corrections, oldest first')
  .option('-n, --limit <n>', 'Show at most this many records')
  .action(async (options) => {
    try {
      const { index } = await openIndex();
      const records = index.list();
      if (records.length === 0) {
        console.log(dim('No corrections stored yet.'));
        return;
      }

      const limit = options.limit ? Number(options.limit) : records.length;
      records.slice(0, limit).forEach((record, i) => {
        console.log(`${chalk.cyan(`${i + 1}.`)} ${chalk.white(`"${record.sourceText || record.key}"`)}`);
        console.log(`   ${chalk.bold(record.correctionPlan)} ${dim(`[${record.tag || 'untagged'}]`)}`);
        if (record.correctionReasoning) {
          console.log(dim(`   → ${record.correctionReasoning}`));
        }
      });
      console.log();
      console.log(dim(`${records.length} records (${index.backendName})`));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// warden memory search <query...>
memoryCommand
  .command('search')
  .argument('<query...>', 'Text to match against stored keys')
  .option('-k, --top <n>', 'Number of results')
  .description('Find the corrections most similar to some text')
  .action(async (query, options) => {
    try {
      const { index, minSimilarity, topK } = await openIndex();
      const results = await index.search(query.join(' '), options.top ? Number(options.top) : topK, minSimilarity);

      if (results.length === 0) {
        console.log(dim('No similar corrections.'));
        return;
      }

      for (const result of results) {
        console.log(`${chalk.white(`"${result.record.sourceText || result.record.key}"`)} ${similarity(result.similarity)}`);
        console.log(`   ${chalk.bold(result.record.correctionPlan)}`);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });
