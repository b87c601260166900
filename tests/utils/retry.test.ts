import { describe, it, expect, vi } from 'vitest';
import { withRetry, isTransientError, errorCode, sleep, type RetryOptions } from '../../src/utils/retry.js';
import { ProvisioningError } from '../../src/utils/errors.js';

function codedError(code: string, message = 'database is locked'): Error {
  return Object.assign(new Error(message), { code });
}

describe('withRetry', () => {
  describe('successful execution', () => {
    it('should return result on first successful attempt', async () => {
      const result = await withRetry(async () => 'success');
      expect(result).toBe('success');
    });

    it('should return complex objects', async () => {
      const data = { tenantId: 'tenant-1', fields: ['bearer'] };
      const result = await withRetry(async () => data);
      expect(result).toEqual(data);
    });
  });

  describe('retry behavior', () => {
    it('should retry on busy-lock error codes', async () => {
      let attempts = 0;
      const result = await withRetry(
        async () => {
          attempts++;
          if (attempts < 3) {
            throw codedError('SQLITE_BUSY');
          }
          return 'success';
        },
        { initialDelayMs: 1, maxDelayMs: 10 }
      );

      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });

    it('should throw after max attempts exceeded', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw codedError('SQLITE_LOCKED', 'table is locked');
          },
          { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 10 }
        )
      ).rejects.toThrow('table is locked');

      expect(attempts).toBe(3);
    });

    it('should not retry errors without a transient code', async () => {
      let attempts = 0;
      await expect(
        withRetry(
          async () => {
            attempts++;
            throw new Error('request timeout');
          },
          { maxAttempts: 3, initialDelayMs: 1 }
        )
      ).rejects.toThrow('request timeout');

      expect(attempts).toBe(1);
    });

    it('should follow the retryable flag of provisioning errors', async () => {
      let retryableAttempts = 0;
      await expect(
        withRetry(
          async () => {
            retryableAttempts++;
            throw new ProvisioningError('flaky', 'transient_ui', true);
          },
          { maxAttempts: 2, initialDelayMs: 1 }
        )
      ).rejects.toThrow('flaky');

      let fatalAttempts = 0;
      await expect(
        withRetry(
          async () => {
            fatalAttempts++;
            throw new ProvisioningError('broken', 'config_invalid', false);
          },
          { maxAttempts: 2, initialDelayMs: 1 }
        )
      ).rejects.toThrow('broken');

      expect(retryableAttempts).toBe(2);
      expect(fatalAttempts).toBe(1);
    });

    it('should wrap non-Error throws', async () => {
      await expect(
        withRetry(
          async () => {
            throw 'plain string';
          },
          { maxAttempts: 1 }
        )
      ).rejects.toThrow('plain string');
    });
  });

  describe('custom retryOn function', () => {
    it('should use custom retryOn logic', async () => {
      let attempts = 0;
      const options: RetryOptions = {
        maxAttempts: 3,
        initialDelayMs: 1,
        retryOn: (error) => error.message.includes('custom-retry'),
      };

      await expect(
        withRetry(async () => {
          attempts++;
          throw new Error('custom-retry-error');
        }, options)
      ).rejects.toThrow();

      expect(attempts).toBe(3);
    });
  });

  describe('onRetry callback', () => {
    it('should pass attempt number and growing delay', async () => {
      const onRetry = vi.fn();

      await expect(
        withRetry(
          async () => {
            throw codedError('SQLITE_BUSY');
          },
          { maxAttempts: 3, initialDelayMs: 20, backoffMultiplier: 2, onRetry }
        )
      ).rejects.toThrow();

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error), 20);
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error), 40);
    });

    it('should cap the delay at maxDelayMs', async () => {
      const onRetry = vi.fn();

      await expect(
        withRetry(
          async () => {
            throw codedError('ECONNRESET');
          },
          { maxAttempts: 4, initialDelayMs: 10, maxDelayMs: 15, onRetry }
        )
      ).rejects.toThrow();

      expect(onRetry.mock.calls.map((call) => call[2])).toEqual([10, 15, 15]);
    });
  });
});

describe('isTransientError', () => {
  it('should recognise transient system codes', () => {
    expect(isTransientError(codedError('SQLITE_BUSY'))).toBe(true);
    expect(isTransientError(codedError('ETIMEDOUT'))).toBe(true);
    expect(isTransientError(codedError('SQLITE_CONSTRAINT'))).toBe(false);
    expect(isTransientError(new Error('SQLITE_BUSY in the message only'))).toBe(false);
  });
});

describe('errorCode', () => {
  it('should read string codes only', () => {
    expect(errorCode(codedError('EPIPE'))).toBe('EPIPE');
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('sleep', () => {
  it('should reject at once with the reason of an aborted signal', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');
    controller.abort(reason);

    await expect(sleep(10_000, controller.signal)).rejects.toBe(reason);
  });

  it('should reject when aborted while waiting', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const pending = sleep(10_000, controller.signal);
      const reason = new Error('cancelled');
      controller.abort(reason);
      await expect(pending).rejects.toBe(reason);
    } finally {
      vi.useRealTimers();
    }
  });
});
