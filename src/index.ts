export * from './errors.js';
export * from './memory/index.js';
export * from './state/ledger.js';
export * from './actions/parser.js';
export * from './actions/applier.js';
export * from './agents/index.js';
export * from './adapters/index.js';
export * from './config/index.js';
export * from './core/types.js';
export * from './core/cost-tracker.js';
export * from './core/run-context.js';
export * from './core/event-log.js';
export * from './core/orchestrator.js';
export * from './core/runtime.js';
export * from './core/dataset.js';
export * from './core/analysis.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
