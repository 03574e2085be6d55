import { readFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { MindgateConfigSchema, type MindgateConfig, type MindgateConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  /** Overrides ~/.mindgate; tests point this at a temp directory. */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: MindgateConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.mindgate');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: MindgateConfigInput): MindgateConfig {
    let raw: Record<string, unknown> = {};

    raw = this.mergeFile(raw, join(this.globalDir, 'config.yaml'), 'global');
    raw = this.mergeFile(raw, join(this.projectDir, '.mindgate.yaml'), 'project');
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = deepMerge(raw, toRecord(overrides));
    }

    const parsed = MindgateConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): MindgateConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  /** Default location of the persistent lesson database. */
  getDefaultMemoryPath(): string {
    return join(this.globalDir, 'memory', 'lessons.db');
  }

  ensureDirectories(): void {
    const dirs = [
      this.globalDir,
      join(this.globalDir, 'memory'),
      join(this.globalDir, 'logs'),
    ];
    for (const dir of dirs) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  private mergeFile(raw: Record<string, unknown>, path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return raw;

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return deepMerge(raw, toRecord(parsed));
    }
    return raw;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const overlay: Record<string, Record<string, unknown>> = {
      llm: {},
      pipeline: {},
      memory: {},
      entropy: {},
    };

    if (env.MINDGATE_LLM_PROVIDER) overlay.llm.provider = env.MINDGATE_LLM_PROVIDER;
    if (env.OLLAMA_BASE_URL) overlay.llm.baseUrl = env.OLLAMA_BASE_URL;
    if (env.MINDGATE_MODEL) overlay.llm.model = env.MINDGATE_MODEL;
    if (env.MINDGATE_MAX_ATTEMPTS) overlay.pipeline.maxAttempts = Number(env.MINDGATE_MAX_ATTEMPTS);
    if (env.MINDGATE_STAGE_TIMEOUT_MS) overlay.pipeline.stageTimeoutMs = Number(env.MINDGATE_STAGE_TIMEOUT_MS);
    if (env.MINDGATE_MEMORY_PATH) overlay.memory.path = env.MINDGATE_MEMORY_PATH;
    if (env.MINDGATE_SEED) {
      overlay.entropy.seed = Number(env.MINDGATE_SEED);
      overlay.entropy.source = 'seeded';
    }

    const populated = Object.fromEntries(
      Object.entries(overlay).filter(([, section]) => Object.keys(section).length > 0),
    );
    return deepMerge(raw, populated);
  }
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    if (isPlainObject(next) && isPlainObject(current)) {
      result[key] = deepMerge(current, next);
    } else if (next !== undefined) {
      result[key] = next;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
