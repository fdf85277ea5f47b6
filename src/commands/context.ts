import { RetrievalClient } from '../client.js';
import { getConfig, type ConfigOverrides, type CorpusConfig } from '../config.js';
import { createConsoleLogger, type Logger } from '../logger.js';

export interface CommandContext {
  config: CorpusConfig;
  logger: Logger;
  client: RetrievalClient;
  /** Machine-readable output on stdout */
  json: boolean;
  print: (text: string) => void;
}

export interface GlobalOptions {
  apiUrl?: string;
  projectId?: string;
  json?: boolean;
  logLevel?: string;
}

const toOverrides = (options: GlobalOptions): ConfigOverrides => ({
  ...(options.apiUrl ? { apiUrl: options.apiUrl } : {}),
  ...(options.projectId ? { projectId: options.projectId } : {}),
  ...(options.logLevel ? { logLevel: options.logLevel } : {}),
});

export function createContext(options: GlobalOptions): CommandContext {
  const config = getConfig(toOverrides(options));
  const logger = createConsoleLogger({ level: config.logLevel });

  const client = new RetrievalClient({
    apiUrl: config.apiUrl,
    projectId: config.projectId,
    timeoutMs: config.requestTimeoutMs,
    healthTimeoutMs: config.healthTimeoutMs,
    logger: logger.child('client'),
  });

  return {
    config,
    logger,
    client,
    json: options.json ?? false,
    print: (text) => console.log(text),
  };
}
