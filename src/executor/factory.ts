/**
 * Build executors from resilience profiles
 */

import type { CircuitBreakerRegistry } from '../circuit-breaker/registry';
import { createLoggerFromConfig, resolveProfile } from '../config/loader';
import type { ResilienceConfig } from '../config/types';
import { RetryPolicy } from '../retry/retry-policy';
import { ResilientExecutor } from './resilient-executor';
import type { ResilientExecutorOptions } from './types';

/**
 * Create an executor for one operation type. The breaker is shared with
 * every other executor built for the same profile name from `registry`.
 * Without `options.logger` the executor logs to the console at the
 * config's `logLevel`.
 *
 * @example
 * ```typescript
 * const registry = new CircuitBreakerRegistry({ logger });
 * const config = loadResilienceConfig();
 * const navigate = createResilientExecutor('navigation', config, registry, { logger });
 * await navigate.run(() => page.goto(url));
 * ```
 */
export function createResilientExecutor(
  profileName: string,
  config: ResilienceConfig,
  registry: CircuitBreakerRegistry,
  options: ResilientExecutorOptions = {}
): ResilientExecutor {
  const profile = resolveProfile(config, profileName);
  const policy = new RetryPolicy(profile.retry);
  const breaker = registry.getCircuit(profile.name, profile.circuitBreaker);
  const logger = options.logger ?? createLoggerFromConfig(config);
  return new ResilientExecutor(policy, breaker, { ...options, logger });
}
