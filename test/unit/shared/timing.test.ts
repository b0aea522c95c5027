import { sleep, untilAborted } from '../../../src/shared/timing.js';
import { LabError, LabErrorCode } from '../../../src/shared/errors.js';

describe('sleep', () => {
  it('resolves immediately for a non-positive delay', async () => {
    const started = Date.now();
    await sleep(0);
    await sleep(-5);
    expect(Date.now() - started).toBeLessThan(50);
  });

  it('resolves early once the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('untilAborted', () => {
  const expired = (): Error => new LabError(LabErrorCode.FETCH_TIMEOUT, 'fetch leaf1 timed out after 20ms');

  it('returns the value when the promise settles first', async () => {
    const controller = new AbortController();
    await expect(untilAborted(Promise.resolve('ok'), controller.signal, expired)).resolves.toBe('ok');
  });

  it('passes through the underlying rejection', async () => {
    const controller = new AbortController();
    await expect(untilAborted(Promise.reject(new Error('refused')), controller.signal, expired)).rejects.toThrow(
      'refused',
    );
  });

  it('rejects with the given reason when the signal aborts first', async () => {
    const controller = new AbortController();
    const pending = untilAborted(new Promise<never>(() => undefined), controller.signal, expired);
    controller.abort();
    const err = await pending.catch((e: unknown) => e);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.FETCH_TIMEOUT);
    expect(err instanceof LabError && err.message).toBe('fetch leaf1 timed out after 20ms');
  });

  it('rejects at once on a signal that is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(untilAborted(new Promise<never>(() => undefined), controller.signal, expired)).rejects.toThrow(
      'timed out after 20ms',
    );
  });
});
