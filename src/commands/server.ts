import { ConfigurationError } from '../errors.js';
import {
  ServiceManager,
  parseDeployment,
  resolveDockerDir,
  type ServiceManagerOptions,
} from '../lifecycle/index.js';
import { formatError, formatSuccess } from '../ui/colors.js';
import { formatServerStatus } from '../ui/format.js';
import type { CommandContext } from './context.js';

export const SERVER_ACTIONS = [
  'setup',
  'start',
  'stop',
  'restart',
  'status',
  'logs',
  'health',
  'validate',
  'update',
] as const;

export type ServerAction = (typeof SERVER_ACTIONS)[number];

export interface ServerCommandOptions {
  deployment?: string;
  dockerDir?: string;
  service?: string;
  tail: number;
}

/** Injection points for tests: command runner, probes, sleeping */
export type ServiceManagerOverrides = Partial<
  Pick<ServiceManagerOptions, 'runner' | 'fetchImpl' | 'sleep' | 'env' | 'startRetries'>
>;

export function parseServerAction(value: string): ServerAction {
  const action = SERVER_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new ConfigurationError(
      `Unknown server action: ${value}. Expected one of ${SERVER_ACTIONS.join(', ')}`,
    );
  }
  return action;
}

export async function createServiceManager(
  ctx: CommandContext,
  options: ServerCommandOptions,
  overrides: ServiceManagerOverrides = {},
): Promise<ServiceManager> {
  return new ServiceManager({
    deployment: parseDeployment(options.deployment ?? ctx.config.deployment),
    dockerDir: await resolveDockerDir(options.dockerDir ?? ctx.config.dockerDir),
    client: ctx.client,
    logger: ctx.logger.child('server'),
    ...overrides,
  });
}

type ManagedAction = 'setup' | 'start' | 'stop' | 'restart' | 'update' | 'validate';

const ACTION_MESSAGES: Record<ManagedAction, [done: string, failed: string]> = {
  setup: ['Server setup completed', 'Server setup failed'],
  start: ['Server started successfully!', 'Server failed to start'],
  stop: ['Server stopped', 'Server failed to stop'],
  restart: ['Server restarted successfully!', 'Server failed to restart'],
  update: ['Services updated', 'Service update failed'],
  validate: ['Setup validated', 'Setup validation failed'],
};

export async function runServer(
  ctx: CommandContext,
  actionName: string,
  options: ServerCommandOptions,
  overrides: ServiceManagerOverrides = {},
): Promise<boolean> {
  const action = parseServerAction(actionName);
  const manager = await createServiceManager(ctx, options, overrides);

  switch (action) {
    case 'status': {
      const status = await manager.getStatus();
      ctx.print(ctx.json ? JSON.stringify(status, null, 2) : formatServerStatus(status));
      return true;
    }
    case 'logs': {
      ctx.print(await manager.getLogs(options.service, options.tail));
      return true;
    }
    case 'health': {
      const healthy = await manager.healthCheck();
      if (ctx.json) {
        ctx.print(JSON.stringify({ healthy }));
      } else {
        ctx.print(healthy ? '🟢 Healthy' : '🔴 Unhealthy');
      }
      return healthy;
    }
    default: {
      const success = await manager[action]();
      const [done, failed] = ACTION_MESSAGES[action];
      if (ctx.json) {
        ctx.print(JSON.stringify({ action, success }));
      } else {
        ctx.print(success ? formatSuccess(done) : formatError(failed));
        if (success && (action === 'setup' || action === 'start' || action === 'restart')) {
          ctx.print(`API URL: ${ctx.client.apiUrl}`);
        }
      }
      return success;
    }
  }
}
