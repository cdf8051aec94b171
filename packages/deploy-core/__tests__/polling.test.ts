import { describe, expect, it, vi } from 'vitest';

import { CancellationError, isDeployError } from '../src/errors';
import { pollUntil } from '../src/polling';

describe('pollUntil', () => {
  it('returns the first defined probe result', async () => {
    let calls = 0;
    const probe = vi.fn(async () => {
      calls += 1;
      return calls >= 3 ? `ready-${calls}` : undefined;
    });

    const result = await pollUntil(probe, { intervalMs: 1, timeoutMs: 5_000, description: 'test probe' });

    expect(result).toBe('ready-3');
    expect(probe).toHaveBeenCalledTimes(3);
  });

  it('treats falsy values other than undefined as results', async () => {
    const result = await pollUntil(async () => false, { intervalMs: 1, timeoutMs: 100, description: 'falsy' });
    expect(result).toBe(false);
  });

  it('fails with a timeout cancellation once the bound is exceeded', async () => {
    const probe = vi.fn(async () => undefined);

    const err = await pollUntil(probe, {
      intervalMs: 5,
      timeoutMs: 30,
      description: 'never ready',
      resourceId: 'node-1',
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancellationError);
    expect(isDeployError(err, 'cancelled')).toBe(true);
    expect((err as CancellationError).reason).toBe('timeout');
    expect((err as CancellationError).resourceId).toBe('node-1');
    expect(probe.mock.calls.length).toBeGreaterThan(1);
  });

  it('stops promptly when the signal aborts during a sleep', async () => {
    const controller = new AbortController();
    const probe = vi.fn(async () => undefined);
    setTimeout(() => controller.abort(), 20);

    const started = Date.now();
    const err = await pollUntil(probe, {
      intervalMs: 10_000,
      timeoutMs: 60_000,
      signal: controller.signal,
      description: 'slow probe',
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancellationError);
    expect((err as CancellationError).reason).toBe('aborted');
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('does not probe at all when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const probe = vi.fn(async () => 'value');

    await expect(
      pollUntil(probe, { intervalMs: 1, timeoutMs: 100, signal: controller.signal, description: 'aborted' }),
    ).rejects.toBeInstanceOf(CancellationError);
    expect(probe).not.toHaveBeenCalled();
  });

  it('propagates probe errors unchanged', async () => {
    const boom = new Error('probe failed');
    await expect(
      pollUntil(
        async () => {
          throw boom;
        },
        { intervalMs: 1, timeoutMs: 100, description: 'failing probe' },
      ),
    ).rejects.toBe(boom);
  });
});
