/**
 * Resilience Config Loader
 *
 * Load resilience profiles from a YAML file.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { InvalidConfigurationError } from '../errors';
import { createConsoleLogger, type Logger, type LogSink } from '../logging';
import { toError } from '../utils/guards';
import type { ResilienceConfig, ResolvedProfile } from './types';
import { mergeCircuitConfig, mergeRetryConfig, validateResilienceConfig } from './validator';

/** Environment variable naming the config file */
export const CONFIG_PATH_ENV = 'RESILIENCE_CONFIG';

/**
 * Expand ~ to home directory
 */
function expandPath(filepath: string): string {
  if (filepath === '~' || filepath.startsWith('~/')) {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

/**
 * Get the config file path, honouring RESILIENCE_CONFIG
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[CONFIG_PATH_ENV];
  if (configured !== undefined && configured.trim() !== '') {
    return expandPath(configured.trim());
  }
  return path.join(os.homedir(), '.resilience', 'config.yaml');
}

/**
 * Parse and validate YAML text
 */
export function parseResilienceConfig(content: string, source = 'resilience config'): ResilienceConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new InvalidConfigurationError(source, [{ path: '', message: toError(error).message }]);
  }

  const result = validateResilienceConfig(raw);
  if (!result.valid) {
    throw new InvalidConfigurationError(source, result.errors);
  }
  return result.config;
}

/**
 * Load a resilience config from a YAML file
 *
 * @param filepath - Defaults to {@link getDefaultConfigPath}
 */
export function loadResilienceConfig(filepath: string = getDefaultConfigPath()): ResilienceConfig {
  const expanded = expandPath(filepath);

  if (!fs.existsSync(expanded)) {
    throw new Error(`Resilience config not found: ${expanded}`);
  }

  const content = fs.readFileSync(expanded, 'utf-8');
  return parseResilienceConfig(content, `resilience config ${expanded}`);
}

/**
 * Merge the defaults with a named profile. Unknown names get the defaults.
 */
export function resolveProfile(config: ResilienceConfig, name: string): ResolvedProfile {
  const overrides = Object.prototype.hasOwnProperty.call(config.profiles, name)
    ? config.profiles[name]
    : undefined;

  return {
    name,
    retry: mergeRetryConfig(config.defaults.retry, overrides?.retry),
    circuitBreaker: mergeCircuitConfig(config.defaults.circuitBreaker, overrides?.circuitBreaker),
  };
}

/**
 * Console logger filtered at the configured `logLevel`
 */
export function createLoggerFromConfig(config: ResilienceConfig, sink: LogSink = console): Logger {
  return createConsoleLogger(config.logLevel, sink);
}

/**
 * Configuration used when no file exists
 */
export function defaultResilienceConfig(): ResilienceConfig {
  return parseResilienceConfig('{}');
}
