/**
 * Races `task` against a timer. The task receives a signal that is aborted on
 * timeout or when `parent` aborts, so it can cancel its own I/O.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const abortFromParent = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', abortFromParent, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    parent?.removeEventListener('abort', abortFromParent);
  }
}
