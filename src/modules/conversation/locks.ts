const sessionLocks = new Map<string, Promise<void>>();

/**
 * Run fn after every earlier call for the same user has settled
 */
export const withSessionLock = async <T>(userId: string, fn: () => Promise<T>): Promise<T> => {
  const previousTail = sessionLocks.get(userId) || Promise.resolve();

  let release = () => {};
  const currentGate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const currentTail = previousTail.then(() => currentGate);
  sessionLocks.set(userId, currentTail);

  await previousTail;
  try {
    return await fn();
  } finally {
    release();
    if (sessionLocks.get(userId) === currentTail) {
      sessionLocks.delete(userId);
    }
  }
};

export const getActiveSessionLocks = (): number => sessionLocks.size;
