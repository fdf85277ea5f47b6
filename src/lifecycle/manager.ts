import fs from 'fs/promises';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import type { RetrievalClient } from '../client.js';
import { ConfigurationError, LifecycleError, RetrievalError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { runCommand, type CommandRunner } from '../tools/run.js';
import {
  DEPLOYMENT_PROFILES,
  type DeploymentProfile,
  type ServerStatus,
  type ServiceState,
} from './types.js';

export type LifecycleClient = Pick<RetrievalClient, 'getHealth' | 'uploadDocument' | 'search'>;

export interface ServiceManagerOptions {
  deployment: DeploymentProfile;
  dockerDir: string;
  client: LifecycleClient;
  runner?: CommandRunner;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Health polls after `up -d` before start gives up */
  startRetries?: number;
  retryIntervalMs?: number;
  restartPauseMs?: number;
  probeTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const VALIDATION_PROJECT_ID = 'validation_test';

const EMBEDDING_PROBES: Partial<Record<DeploymentProfile, { url: string; port: number }>> = {
  local: { url: 'http://localhost:11434/api/tags', port: 11434 },
  tei: { url: 'http://localhost:8080/health', port: 8080 },
};

const composeServiceSchema = z
  .object({
    Service: z.string(),
    State: z.string(),
    Health: z.string().optional(),
  })
  .passthrough();

export const isDeploymentProfile = (value: string): value is DeploymentProfile =>
  DEPLOYMENT_PROFILES.some((profile) => profile === value);

export function parseDeployment(value: string): DeploymentProfile {
  if (!isDeploymentProfile(value)) {
    throw new ConfigurationError(
      `Unknown deployment profile: ${value}. Expected one of ${DEPLOYMENT_PROFILES.join(', ')}`,
    );
  }
  return value;
}

export const composeFileFor = (deployment: DeploymentProfile): string =>
  `docker-compose.${deployment}.yml`;

export const setupScriptFor = (deployment: DeploymentProfile): string =>
  `setup-${deployment}.sh`;

/**
 * `docker compose ps --format json` prints either one array or one object per line
 */
export function parseComposePs(stdout: string): Record<string, ServiceState> {
  const text = stdout.trim();
  if (!text) return {};

  const raw: unknown = text.startsWith('[')
    ? JSON.parse(text)
    : text.split('\n').filter(Boolean).map((line) => JSON.parse(line));

  const services = z.array(composeServiceSchema).parse(raw);
  const result: Record<string, ServiceState> = {};
  for (const service of services) {
    result[service.Service] = { state: service.State, health: service.Health || 'unknown' };
  }
  return result;
}

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Locate the directory holding the compose files: an explicit setting wins,
 * otherwise `./docker`, then `../docker`.
 */
export async function resolveDockerDir(explicit?: string, cwd = process.cwd()): Promise<string> {
  if (explicit) return path.resolve(cwd, explicit);

  const candidates = [path.join(cwd, 'docker'), path.join(path.dirname(cwd), 'docker')];
  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }
  return candidates[0];
}

/**
 * Drives the compose-orchestrated backing service for one deployment profile
 */
export class ServiceManager {
  readonly deployment: DeploymentProfile;
  readonly dockerDir: string;
  private readonly client: LifecycleClient;
  private readonly runner: CommandRunner;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly startRetries: number;
  private readonly retryIntervalMs: number;
  private readonly restartPauseMs: number;
  private readonly probeTimeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ServiceManagerOptions) {
    this.deployment = options.deployment;
    this.dockerDir = options.dockerDir;
    this.client = options.client;
    this.runner = options.runner ?? runCommand;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
    this.env = options.env ?? process.env;
    this.startRetries = options.startRetries ?? 30;
    this.retryIntervalMs = options.retryIntervalMs ?? 10000;
    this.restartPauseMs = options.restartPauseMs ?? 5000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get composeFile(): string {
    return composeFileFor(this.deployment);
  }

  private compose(...args: string[]) {
    const command = ['docker', 'compose', '-f', this.composeFile, ...args];
    this.logger.debug(`Running command: ${command.join(' ')}`);
    return this.runner(command, { cwd: this.dockerDir });
  }

  async checkPrerequisites(): Promise<boolean> {
    this.logger.info('Checking prerequisites...');

    if ((await this.runner(['docker', '--version'])).code !== 0) {
      this.logger.error('Docker is not available');
      return false;
    }
    if ((await this.runner(['docker', 'compose', 'version'])).code !== 0) {
      this.logger.error('Docker Compose is not available');
      return false;
    }
    if (!(await exists(this.dockerDir))) {
      this.logger.error(`Docker directory not found: ${this.dockerDir}`);
      return false;
    }
    const composePath = path.join(this.dockerDir, this.composeFile);
    if (!(await exists(composePath))) {
      this.logger.error(`Compose file not found: ${composePath}`);
      return false;
    }

    this.logger.info('Prerequisites check passed');
    return true;
  }

  async start(): Promise<boolean> {
    this.logger.info(`Starting RAG server (${this.deployment})...`);
    if (!(await this.checkPrerequisites())) return false;

    const result = await this.compose('up', '-d');
    if (result.code !== 0) {
      this.logger.error('Failed to start services', new LifecycleError(result.stderr.trim()));
      return false;
    }

    if (await this.waitForHealth()) {
      this.logger.info('RAG server started successfully');
      return true;
    }
    this.logger.error('RAG server failed to start within timeout');
    return false;
  }

  private async waitForHealth(): Promise<boolean> {
    this.logger.info('Waiting for services to be ready...');
    for (let attempt = 1; attempt <= this.startRetries; attempt++) {
      if (await this.healthCheck()) return true;
      this.logger.info(`Waiting... (attempt ${attempt}/${this.startRetries})`);
      if (attempt < this.startRetries) await this.sleep(this.retryIntervalMs);
    }
    return false;
  }

  /**
   * First-time setup: run the profile's `setup-<profile>.sh` from the docker
   * directory, then wait for health. Without a script the services are started directly.
   */
  async setup(): Promise<boolean> {
    this.logger.info(`Setting up RAG server with ${this.deployment} deployment`);
    if (!(await this.checkPrerequisites())) return false;

    if (this.deployment === 'production') {
      this.logger.info('Production setup requires manual configuration');
      this.logger.info('Please ensure database and API credentials are configured');
    }

    const script = setupScriptFor(this.deployment);
    if (!(await exists(path.join(this.dockerDir, script)))) {
      this.logger.warn(`Setup script not found: ${path.join(this.dockerDir, script)}`);
      return this.start();
    }

    this.logger.info(`Running setup script: ${script}`);
    const result = await this.runner(['bash', script], { cwd: this.dockerDir });
    if (result.code !== 0) {
      this.logger.error('Setup script failed', new LifecycleError(result.stderr.trim()));
      return false;
    }

    if (await this.waitForHealth()) {
      this.logger.info('RAG server setup completed successfully');
      return true;
    }
    this.logger.error('RAG server setup failed');
    return false;
  }

  async stop(): Promise<boolean> {
    this.logger.info('Stopping RAG server...');
    const result = await this.compose('down');
    if (result.code !== 0) {
      this.logger.error('Failed to stop services', new LifecycleError(result.stderr.trim()));
      return false;
    }
    this.logger.info('RAG server stopped successfully');
    return true;
  }

  async restart(): Promise<boolean> {
    this.logger.info('Restarting RAG server...');
    if (!(await this.stop())) return false;
    await this.sleep(this.restartPauseMs);
    return this.start();
  }

  /**
   * Pull newer images, then restart on them
   */
  async update(): Promise<boolean> {
    this.logger.info('Updating RAG services...');
    const result = await this.compose('pull');
    if (result.code !== 0) {
      this.logger.error('Failed to pull images', new LifecycleError(result.stderr.trim()));
      return false;
    }
    return this.restart();
  }

  async getStatus(): Promise<ServerStatus> {
    let services: Record<string, ServiceState> = {};
    const ps = await this.compose('ps', '--format', 'json');
    if (ps.code === 0) {
      try {
        services = parseComposePs(ps.stdout);
      } catch (error) {
        this.logger.warn('Could not parse docker compose status', { error: errorMessage(error) });
      }
    } else {
      this.logger.debug('docker compose ps failed', { stderr: ps.stderr.trim() });
    }

    const report = await this.client.getHealth();
    const probe = EMBEDDING_PROBES[this.deployment];

    return {
      deployment: this.deployment,
      services,
      health: {
        ragApi: report.healthy,
        database: report.healthy && report.status === 'UP',
        embeddings: await this.checkEmbeddings(),
      },
      ports: {
        ragApi: 8000,
        database: 5432,
        embeddings: probe?.port ?? null,
      },
    };
  }

  private async checkEmbeddings(): Promise<boolean> {
    if (this.deployment === 'openai') {
      return Boolean(this.env.OPENAI_API_KEY);
    }

    const probe = EMBEDDING_PROBES[this.deployment];
    if (!probe) return false;

    try {
      const res = await this.fetchImpl(probe.url, {
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      return res.ok;
    } catch (error) {
      this.logger.debug('Embeddings probe failed', { url: probe.url, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Healthy when the API and its database are up. Embeddings are reported but not required.
   */
  async healthCheck(): Promise<boolean> {
    const { health } = await this.getStatus();
    return health.ragApi && health.database;
  }

  async getLogs(service?: string, tail = 100): Promise<string> {
    const args = ['logs', '--tail', String(tail)];
    if (service) args.push(service);

    const result = await this.compose(...args);
    if (result.code !== 0) {
      throw new LifecycleError('Error getting logs', result.stderr.trim() || undefined);
    }
    return result.stdout;
  }

  /**
   * Prerequisites, health, then a round trip: one test upload and one test search
   */
  async validate(): Promise<boolean> {
    this.logger.info('Validating RAG setup...');
    if (!(await this.checkPrerequisites())) return false;

    if (!(await this.healthCheck())) {
      this.logger.error('Health check failed');
      return false;
    }

    const content = new TextEncoder().encode('This is a test document for RAG validation.');
    const upload = await this.client.uploadDocument({
      content,
      filename: 'test.txt',
      projectId: VALIDATION_PROJECT_ID,
      metadata: {
        source: 'test.txt',
        file_type: 'documentation',
        language: null,
        size: content.byteLength,
        last_modified: Date.now(),
        project_id: VALIDATION_PROJECT_ID,
      },
    });
    if (!upload.ok) {
      this.logger.error('Document upload test failed', new Error(upload.error));
      return false;
    }

    try {
      await this.client.search('test document', { projectId: VALIDATION_PROJECT_ID, limit: 1 });
    } catch (error) {
      // An empty project may answer 404; the endpoint still exists
      if (!(error instanceof RetrievalError && error.status === 404)) {
        this.logger.error('Search endpoint test failed', error);
        return false;
      }
    }

    this.logger.info('RAG setup validation completed successfully');
    return true;
  }
}
