/**
 * Executor Module
 */

export type {
  Operation,
  ResilientExecutorOptions,
  RetryEvent,
  RunContext,
  RunOptions,
} from './types';

export { ResilientExecutor } from './resilient-executor';
export { createResilientExecutor } from './factory';
export { sleep } from './sleep';
