import { withTimeout } from './timeout.util';

describe('withTimeout', () => {
  const timeoutError = () => new Error('timed out');

  it('should resolve with the task result when it finishes in time', async () => {
    await expect(withTimeout(async () => 42, 1000, timeoutError)).resolves.toBe(42);
  });

  it('should reject with the timeout error and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const task = (signal: AbortSignal) => {
      taskSignal = signal;
      return new Promise<number>(() => undefined);
    };

    await expect(withTimeout(task, 10, timeoutError)).rejects.toThrow('timed out');
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should propagate task failures', async () => {
    await expect(
      withTimeout(() => Promise.reject(new Error('boom')), 1000, timeoutError),
    ).rejects.toThrow('boom');
  });

  it('should abort the task signal when the parent aborts', async () => {
    const parent = new AbortController();
    parent.abort();
    let seen = false;

    await withTimeout(
      async signal => {
        seen = signal.aborted;
      },
      1000,
      timeoutError,
      parent.signal,
    );

    expect(seen).toBe(true);
  });
});
