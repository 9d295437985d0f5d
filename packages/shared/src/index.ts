export {
  DuplicateKeyError,
  isDuplicateKeyError,
} from './errors/duplicate-key-error';
export { ResourceTimeoutError } from './errors/resource-timeout-error';
export { ConcurrentPool } from './utils/concurrent-pool';
export {
  executeIdempotentWrite,
  type IdempotentWriteResult,
} from './utils/idempotent-write';
export {
  DEFAULT_JOB_LOCK_TIMEOUT_MS,
  JobLockRegistry,
  type JobLockRegistryOptions,
  type ReleaseFn,
} from './utils/job-lock-registry';
