// Simple in-process async lock per key.
// NOTE: For a multi-process deployment, replace with a distributed lock.
const queues = new Map<string, Promise<void>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = queues.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const next = new Promise<void>((res) => (release = res));
  const tail = prev.then(() => next);
  queues.set(key, tail);

  await prev;
  try {
    return await fn();
  } finally {
    release();
    // cleanup if chain finished
    if (queues.get(key) === tail) queues.delete(key);
  }
}
