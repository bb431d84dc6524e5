import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';

export const AGENT_PROVIDERS = ['heuristic', 'ollama', 'openai', 'together', 'anthropic'] as const;

function agentConfigSchema(defaults: { name: string; pricePer1kTokens: number }) {
  return z.object({
    provider: z.enum(AGENT_PROVIDERS).default('heuristic'),
    name: z.string().min(1).default(defaults.name),
    temperature: z.number().min(0).max(2).default(0.4),
    maxTokens: z.number().int().positive().default(256),
    pricePer1kTokens: z.number().nonnegative().default(defaults.pricePer1kTokens),
  });
}

export const ProposerConfigSchema = agentConfigSchema({
  name: 'llama3.2',
  pricePer1kTokens: 0.0002,
});

export const ReviewerConfigSchema = agentConfigSchema({
  name: 'llama3.1:70b',
  pricePer1kTokens: 0.0007,
});

export const MemoryConfigSchema = z.object({
  backend: z.enum(['lexical', 'embedding']).default('lexical'),
  embeddingProvider: z.enum(['simple', 'ollama', 'openai']).default('ollama'),
  embeddingModel: z.string().optional(),
  topK: z.number().int().nonnegative().default(3),
  minSimilarity: z.number().min(0).max(1).default(0.05),
  includeStateInKey: z.boolean().default(false),
  persistencePath: z.string().min(1).default('memory.json'),
});

export const LoopConfigSchema = z.object({
  maxEvents: z.number().int().positive().default(50),
  reportEvery: z.number().int().positive().default(10),
  mode: z.enum(['review', 'compare']).default('review'),
  useState: z.boolean().default(true),
  useRetrieval: z.boolean().default(true),
  dataPath: z.string().min(1).default('events.json'),
  statePath: z.string().min(1).default('ledger.json'),
  logPath: z.string().min(1).default('events.jsonl'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  memory: MemoryConfigSchema.default({}),
  proposer: ProposerConfigSchema.default({}),
  reviewer: ReviewerConfigSchema.default({}),
  loop: LoopConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AgentConfig = z.infer<typeof ProposerConfigSchema>;
export type AgentProvider = AgentConfig['provider'];
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type LoopConfig = z.infer<typeof LoopConfigSchema>;
export type RunMode = LoopConfig['mode'];

export const WARDEN_DIR = '.warden';
export const CONFIG_FILE = 'config.json';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const wardenPath = path.join(currentDir, WARDEN_DIR);
    if (fs.existsSync(wardenPath) && fs.statSync(wardenPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getWardenPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in a chatwarden project. Run `warden init` first.');
  }
  return path.join(root, WARDEN_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getWardenPath(projectRoot), CONFIG_FILE);
}

/**
 * Relative paths in the config live under `.warden/`; absolute ones are
 * taken as they are.
 */
export function resolveProjectPath(filePath: string, projectRoot?: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(getWardenPath(projectRoot), filePath);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return defaultConfig();
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const wardenPath = path.join(targetDir, WARDEN_DIR);

  if (fs.existsSync(wardenPath) && !force) {
    throw new Error('chatwarden already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(wardenPath, { recursive: true, mode: 0o700 });

  fs.writeFileSync(
    path.join(wardenPath, CONFIG_FILE),
    JSON.stringify(defaultConfig(), null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(wardenPath, '.gitignore'), `# chatwarden run artefacts
memory.json
ledger.json
events.jsonl
`);

  return wardenPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setConfigValue(key: string, value: string, projectRoot?: string): Config {
  const config: Record<string, unknown> = { ...loadConfig(projectRoot) };
  const keys = key.split('.');
  const lastKey = keys[keys.length - 1];

  let current = config;
  for (const segment of keys.slice(0, -1)) {
    const next = current[segment];
    if (!isRecord(next)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    const copy = { ...next };
    current[segment] = copy;
    current = copy;
  }

  if (!Object.hasOwn(current, lastKey) && !(keys.length === 2 && keys[0] === 'memory' && lastKey === 'embeddingModel')) {
    throw new Error(`Invalid config key: ${key}`);
  }

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      throw new Error(`Expected a number for ${key}, got "${value}"`);
    }
    current[lastKey] = parsed;
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
  return validated;
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);

  let current: unknown = config;
  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
