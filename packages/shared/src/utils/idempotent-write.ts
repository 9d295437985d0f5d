import type { LoggerMethods } from '@regroup/logger';

import { isDuplicateKeyError } from '../errors/duplicate-key-error';

export interface IdempotentWriteResult<T> {
  value: T;

  /**
   * True when the write lost a duplicate-key race and the committed value
   * was read back
   */
  reusedExisting: boolean;
}

/**
 * Run a write that may race with an identical earlier write.
 *
 * A duplicate-key failure is an expected outcome of a retried job: the
 * committed value is read back instead of retrying. Any other failure, or a
 * duplicate with nothing to read back, propagates unchanged.
 *
 * @param write - Insert of the new value
 * @param readExisting - Lookup of the committed value
 * @param logger - Optional logger for the fallback path
 */
export async function executeIdempotentWrite<T>(
  write: () => Promise<T>,
  readExisting: () => Promise<T | undefined>,
  logger?: LoggerMethods,
): Promise<IdempotentWriteResult<T>> {
  try {
    return { value: await write(), reusedExisting: false };
  } catch (error) {
    if (!isDuplicateKeyError(error)) {
      throw error;
    }

    logger?.info(
      '[IdempotentWrite] Duplicate key on write, reading committed value',
    );
    const existing = await readExisting();
    if (existing === undefined) {
      throw error;
    }
    return { value: existing, reusedExisting: true };
  }
}
