import { describe, expect, test } from 'vitest';

import { ResourceTimeoutError } from './resource-timeout-error';

describe('ResourceTimeoutError', () => {
  test('describes the job and the bound', () => {
    const cause = new Error('underlying');
    const error = new ResourceTimeoutError('job-7', 500, { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ResourceTimeoutError');
    expect(error.message).toBe(
      'Timed out after 500ms waiting for the lock of job "job-7"',
    );
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
  });
});
