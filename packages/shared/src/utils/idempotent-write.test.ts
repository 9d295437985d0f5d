import type { LoggerMethods } from '@regroup/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { DuplicateKeyError } from '../errors/duplicate-key-error';
import { executeIdempotentWrite } from './idempotent-write';

describe('executeIdempotentWrite', () => {
  let logger: LoggerMethods;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  test('returns the written value on success', async () => {
    const readExisting = vi.fn(async () => 'old');

    const result = await executeIdempotentWrite(
      async () => 'new',
      readExisting,
      logger,
    );

    expect(result).toEqual({ value: 'new', reusedExisting: false });
    expect(readExisting).not.toHaveBeenCalled();
  });

  test('reads the committed value back on a duplicate key', async () => {
    const result = await executeIdempotentWrite(
      async () => {
        throw new DuplicateKeyError('job-1/1');
      },
      async () => 'committed',
      logger,
    );

    expect(result).toEqual({ value: 'committed', reusedExisting: true });
    expect(logger.info).toHaveBeenCalledWith(
      '[IdempotentWrite] Duplicate key on write, reading committed value',
    );
  });

  test('treats driver duplicate codes the same way', async () => {
    const result = await executeIdempotentWrite(
      async () => {
        throw Object.assign(new Error('unique violation'), { code: '23505' });
      },
      async () => 42,
    );

    expect(result).toEqual({ value: 42, reusedExisting: true });
  });

  test('rethrows the duplicate when nothing can be read back', async () => {
    const duplicate = new DuplicateKeyError('job-1/1');

    await expect(
      executeIdempotentWrite(
        async () => {
          throw duplicate;
        },
        async () => undefined,
      ),
    ).rejects.toBe(duplicate);
  });

  test('propagates other failures without reading', async () => {
    const readExisting = vi.fn(async () => 'committed');

    await expect(
      executeIdempotentWrite(async () => {
        throw new Error('connection lost');
      }, readExisting),
    ).rejects.toThrow('connection lost');
    expect(readExisting).not.toHaveBeenCalled();
  });
});
