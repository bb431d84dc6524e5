import { createProposer, createReviewer } from '../agents/index.js';
import type { Proposer, Reviewer } from '../agents/index.js';
import { resolveProjectPath } from '../config/index.js';
import type { Config, RunMode } from '../config/index.js';
import { SimilarityIndex } from '../memory/index-store.js';
import { createSimilarityBackend } from '../memory/similarity.js';
import { SubjectLedger } from '../state/ledger.js';
import { EventLog } from './event-log.js';
import { DecisionOrchestrator } from './orchestrator.js';
import { RunContext } from './run-context.js';
import type { RunReporter } from './run-context.js';

export interface RuntimeOptions {
  mode?: RunMode;
  useState?: boolean;
  useRetrieval?: boolean;
  reporter?: RunReporter;
  env?: NodeJS.ProcessEnv;
}

export interface RuntimePaths {
  memory: string;
  ledger: string;
  log: string;
  data: string;
}

export interface Runtime {
  orchestrator: DecisionOrchestrator;
  proposer: Proposer;
  reviewer: Reviewer & Proposer;
  index: SimilarityIndex;
  ledger: SubjectLedger;
  context: RunContext;
  paths: RuntimePaths;
  restored: { records: number; subjects: number };
}

export function resolveRuntimePaths(config: Config, projectRoot?: string): RuntimePaths {
  return {
    memory: resolveProjectPath(config.memory.persistencePath, projectRoot),
    ledger: resolveProjectPath(config.loop.statePath, projectRoot),
    log: resolveProjectPath(config.loop.logPath, projectRoot),
    data: resolveProjectPath(config.loop.dataPath, projectRoot),
  };
}

/**
 * Wire a configured orchestrator and load the existing snapshots.
 */
export async function createRuntime(
  config: Config,
  projectRoot?: string,
  options: RuntimeOptions = {}
): Promise<Runtime> {
  const env = options.env ?? process.env;
  const paths = resolveRuntimePaths(config, projectRoot);

  const backend = await createSimilarityBackend({
    backend: config.memory.backend,
    embeddingProvider: config.memory.embeddingProvider,
    embeddingModel: config.memory.embeddingModel,
    env,
  });
  const index = new SimilarityIndex(backend);
  const ledger = new SubjectLedger(paths.ledger);
  const context = new RunContext(options.reporter);

  const proposer = createProposer(config.proposer, { env, costs: context.costs });
  const reviewer = createReviewer(config.reviewer, { env, costs: context.costs });

  const orchestrator = new DecisionOrchestrator(
    {
      index,
      ledger,
      proposer,
      reviewer,
      reference: reviewer,
      context,
      eventLog: new EventLog(paths.log),
    },
    {
      topK: config.memory.topK,
      minSimilarity: config.memory.minSimilarity,
      includeStateInKey: config.memory.includeStateInKey,
      mode: options.mode ?? config.loop.mode,
      useState: options.useState ?? config.loop.useState,
      useRetrieval: options.useRetrieval ?? config.loop.useRetrieval,
      memoryPath: paths.memory,
      ledgerPath: paths.ledger,
    }
  );

  const restored = await orchestrator.restore();
  return { orchestrator, proposer, reviewer, index, ledger, context, paths, restored };
}

/**
 * Names of the agents whose model backend does not answer. Heuristic agents
 * have nothing to check.
 */
export async function unreachableAgents(runtime: Pick<Runtime, 'proposer' | 'reviewer'>): Promise<string[]> {
  const unreachable: string[] = [];
  for (const agent of [runtime.proposer, runtime.reviewer]) {
    if (agent.healthCheck && !(await agent.healthCheck())) {
      unreachable.push(agent.name);
    }
  }
  return unreachable;
}
