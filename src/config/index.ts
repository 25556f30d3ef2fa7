/**
 * Configuration Module
 *
 * YAML resilience profiles: per-operation retry and circuit settings.
 */

export type {
  ConfigValidationResult,
  ResilienceConfig,
  ResilienceProfileOverrides,
  ResolvedProfile,
} from './types';

export {
  validateResilienceConfig,
  mergeRetryConfig,
  mergeCircuitConfig,
} from './validator';

export {
  CONFIG_PATH_ENV,
  createLoggerFromConfig,
  defaultResilienceConfig,
  getDefaultConfigPath,
  loadResilienceConfig,
  parseResilienceConfig,
  resolveProfile,
} from './loader';
