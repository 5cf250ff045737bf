import { describe, it, expect } from 'vitest';
import { runWithDeadline } from '../../../../src/shared/http/deadline';
import { AppError } from '../../../../src/shared/http/errors';

describe('runWithDeadline', () => {
  it('returns the result of work that finishes in time', async () => {
    await expect(runWithDeadline(1_000, async () => 'done')).resolves.toBe('done');
  });

  it('propagates the error of work that fails in time', async () => {
    await expect(
      runWithDeadline(1_000, async () => {
        throw new Error('store down');
      }),
    ).rejects.toThrow('store down');
  });

  it('rejects with TIMEOUT and aborts the signal once the deadline passes', async () => {
    let seen: AbortSignal | undefined;

    const result = runWithDeadline(20, (signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    });

    await expect(result).rejects.toBeInstanceOf(AppError);
    await expect(result).rejects.toMatchObject({ code: 'TIMEOUT', status: 503 });

    expect(seen?.aborted).toBe(true);
    expect(() => seen?.throwIfAborted()).toThrow('The request took too long to complete.');
  });
});
