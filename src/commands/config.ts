import {
  CONFIG_KEYS,
  ENV_VARS,
  clearConfig,
  getConfig,
  isConfigKey,
  setConfig,
  type CorpusConfig,
  type ConfigKey,
  type StoredConfig,
} from '../config.js';
import { ConfigurationError } from '../errors.js';
import { formatHeader, formatSuccess, theme } from '../ui/colors.js';

export interface ConfigAccess {
  get(): CorpusConfig;
  set(key: ConfigKey, value: string): StoredConfig;
  clear(): void;
}

export interface ConfigCommandOptions {
  reset?: boolean;
  json?: boolean;
}

const storedConfig: ConfigAccess = {
  get: () => getConfig(),
  set: setConfig,
  clear: clearConfig,
};

export function formatConfig(config: CorpusConfig): string[] {
  const width = Math.max(...CONFIG_KEYS.map((key) => key.length)) + 2;
  const lines = [formatHeader('Corpus Configuration:')];
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    const shown = value === undefined ? theme.dim('Not set') : String(value);
    lines.push(`  ${`${key}:`.padEnd(width)}${shown}${theme.dim(`  (${ENV_VARS[key]})`)}`);
  }
  return lines;
}

/**
 * `config` shows the effective settings, `config <key> <value>` stores one,
 * `config --reset` clears every stored value.
 */
export function runConfig(
  key: string | undefined,
  value: string | undefined,
  options: ConfigCommandOptions,
  print: (text: string) => void,
  access: ConfigAccess = storedConfig,
): boolean {
  if (options.reset) {
    access.clear();
    print(formatSuccess('Configuration reset to defaults.'));
    return true;
  }

  if (!key) {
    const config = access.get();
    if (options.json) {
      print(JSON.stringify(config, null, 2));
    } else {
      for (const line of formatConfig(config)) print(line);
    }
    return true;
  }

  if (!isConfigKey(key)) {
    throw new ConfigurationError(
      `Unknown configuration key: ${key}. Expected one of ${CONFIG_KEYS.join(', ')}`,
    );
  }
  if (value === undefined) {
    throw new ConfigurationError(`Missing value for ${key}`);
  }

  access.set(key, value);
  print(formatSuccess('Configuration updated.'));
  return true;
}
