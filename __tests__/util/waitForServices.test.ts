import { describe, it, expect, vi } from 'vitest';
import { waitFor } from '../../src/util/waitForServices.js';
import { AppError } from '../../src/errors/index.js';
import { recordingSleep } from '../fixtures/fakes.js';

describe('waitFor', () => {
  it('should retry a probe until the service answers', async () => {
    const { sleep, delays } = recordingSleep();
    const probe = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce(undefined);

    await waitFor('redis', probe, { maxAttempts: 3, delayMs: 50, sleep });
    expect(probe).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([50]);
  });

  it('should give up after the last attempt', async () => {
    const { sleep, delays } = recordingSleep();
    const probe = vi.fn<() => Promise<void>>().mockRejectedValue(new Error('ECONNREFUSED'));

    const err = await waitFor('kafka', probe, { maxAttempts: 2, delayMs: 50, sleep }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ code: 'SERVICE_UNAVAILABLE', message: 'kafka not ready after 2 attempts: ECONNREFUSED' });
    expect(delays).toEqual([50]);
  });
});
