import Conf from 'conf';
import { config as dotenvConfig } from 'dotenv';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEPLOYMENT_PROFILES, type DeploymentProfile } from './lifecycle/types.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface CorpusConfig {
  apiUrl: string;
  projectId: string;
  deployment: DeploymentProfile;
  batchSize: number;
  requestTimeoutMs: number;
  healthTimeoutMs: number;
  logLevel: LogLevel;
  dockerDir?: string;
}

export type StoredConfig = Partial<CorpusConfig>;

export type ConfigKey = keyof CorpusConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'apiUrl',
  'projectId',
  'deployment',
  'batchSize',
  'requestTimeoutMs',
  'healthTimeoutMs',
  'logLevel',
  'dockerDir',
];

export const ENV_VARS: Record<ConfigKey, string> = {
  apiUrl: 'RAG_API_URL',
  projectId: 'RAG_PROJECT_ID',
  deployment: 'RAG_DEPLOYMENT',
  batchSize: 'RAG_BATCH_SIZE',
  requestTimeoutMs: 'RAG_REQUEST_TIMEOUT_MS',
  healthTimeoutMs: 'RAG_HEALTH_TIMEOUT_MS',
  logLevel: 'LOG_LEVEL',
  dockerDir: 'RAG_DOCKER_DIR',
};

export const DEFAULT_CONFIG: CorpusConfig = {
  apiUrl: 'http://localhost:8000',
  projectId: 'default',
  deployment: 'local',
  batchSize: 10,
  requestTimeoutMs: 30000,
  healthTimeoutMs: 5000,
  logLevel: 'info',
};

const positiveInt = z.coerce.number().int().positive();

// One schema per key; used for env strings, stored values and `config` updates alike
const fieldSchemas = {
  apiUrl: z.string().url(),
  projectId: z.string().min(1),
  deployment: z.enum(DEPLOYMENT_PROFILES),
  batchSize: positiveInt,
  requestTimeoutMs: positiveInt,
  healthTimeoutMs: positiveInt,
  logLevel: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(LOG_LEVELS),
  ),
  dockerDir: z.string().min(1),
} satisfies Record<ConfigKey, z.ZodTypeAny>;

const configSchema = z.object(fieldSchemas);

const lenientSchema = z.object({
  apiUrl: fieldSchemas.apiUrl.optional().catch(undefined),
  projectId: fieldSchemas.projectId.optional().catch(undefined),
  deployment: fieldSchemas.deployment.optional().catch(undefined),
  batchSize: fieldSchemas.batchSize.optional().catch(undefined),
  requestTimeoutMs: fieldSchemas.requestTimeoutMs.optional().catch(undefined),
  healthTimeoutMs: fieldSchemas.healthTimeoutMs.optional().catch(undefined),
  logLevel: fieldSchemas.logLevel.optional().catch(undefined),
  dockerDir: fieldSchemas.dockerDir.optional().catch(undefined),
});

export const isConfigKey = (value: string): value is ConfigKey =>
  CONFIG_KEYS.some((key) => key === value);

function dropUndefined(values: StoredConfig): StoredConfig {
  const result: StoredConfig = {};
  for (const key of CONFIG_KEYS) {
    if (values[key] !== undefined) Object.assign(result, { [key]: values[key] });
  }
  return result;
}

/**
 * Values set through `RAG_*` environment variables. Unparseable values are ignored.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): StoredConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_VARS[key]];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  return dropUndefined(lenientSchema.parse(raw));
}

/** Raw command-line values, validated like any other source */
export type ConfigOverrides = Partial<Record<ConfigKey, string | number>>;

function parseOverrides(overrides: ConfigOverrides): StoredConfig {
  const parsed = configSchema.partial().safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid command-line option',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }
  return dropUndefined(parsed.data);
}

export interface ResolveConfigOptions {
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  stored?: unknown;
}

/**
 * Merge configuration with priority:
 * 1. CLI flags
 * 2. Environment variables (from .env or shell)
 * 3. Stored config (from conf)
 * 4. Defaults
 */
export function resolveConfig(options: ResolveConfigOptions = {}): CorpusConfig {
  const stored = lenientSchema.safeParse(options.stored ?? {});

  const merged = {
    ...DEFAULT_CONFIG,
    ...(stored.success ? dropUndefined(stored.data) : {}),
    ...readEnvConfig(options.env),
    ...parseOverrides(options.overrides ?? {}),
  };

  const parsed = configSchema.partial({ dockerDir: true }).safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', parsed.error.message);
  }
  return parsed.data;
}

/**
 * Validate one `config <key> <value>` update and return it typed
 */
export function parseConfigValue(key: ConfigKey, value: string): StoredConfig {
  const parsed = fieldSchemas[key].safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for ${key}: ${value}`,
      parsed.error.issues.map((issue) => issue.message).join('; '),
    );
  }
  return dropUndefined(lenientSchema.parse({ [key]: parsed.data }));
}

/**
 * Load .env files in order of precedence (later files override earlier):
 * ~/.corpus/.env, then ./.env
 */
export function loadEnvFiles(cwd = process.cwd()): void {
  const homeEnvPath = path.join(process.env.HOME || '', '.corpus', '.env');
  const cwdEnvPath = path.join(cwd, '.env');

  if (fs.existsSync(homeEnvPath)) {
    dotenvConfig({ path: homeEnvPath });
  }
  if (fs.existsSync(cwdEnvPath)) {
    dotenvConfig({ path: cwdEnvPath, override: true });
  }
}

let store: Conf<StoredConfig> | undefined;

const getStore = (): Conf<StoredConfig> => {
  store ??= new Conf<StoredConfig>({ projectName: 'corpus' });
  return store;
};

export const getConfig = (overrides: ConfigOverrides = {}): CorpusConfig =>
  resolveConfig({ overrides, stored: getStore().store });

export const setConfig = (key: ConfigKey, value: string): StoredConfig => {
  const update = parseConfigValue(key, value);
  getStore().set(update);
  return update;
};

export const clearConfig = () => {
  getStore().clear();
};
