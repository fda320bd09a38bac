/**
 * Serializes async work per key. Tasks sharing a key run one after another in
 * arrival order; different keys never wait on each other.
 */
export const createKeyedQueue = () => {
  const tails = new Map<string, Promise<void>>();

  const run = <T>(key: string, task: () => Promise<T>): Promise<T> => {
    const previous = tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain must survive a failed task, otherwise one error blocks the key forever.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    tails.set(key, tail);
    void tail.then(() => {
      if (tails.get(key) === tail) tails.delete(key);
    });
    return result;
  };

  return {
    run,
    pendingKeys: () => tails.size,
  };
};

export type KeyedQueue = ReturnType<typeof createKeyedQueue>;
