/**
 * Start `task` and reject with `onTimeout()` if it has not settled
 * within `timeoutMs`. The task keeps running; its late result is dropped.
 */
export async function withDeadline<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([task(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
