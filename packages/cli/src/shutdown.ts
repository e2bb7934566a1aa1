/**
 * Shutdown cleanup registry.
 *
 * Cleanups run once, newest first, whether the interface exits normally or
 * the process receives a termination signal.
 */

type Cleanup = () => void;

let cleanups: Cleanup[] = [];

/**
 * Registers a cleanup. Returns a function that unregisters it.
 */
export function onShutdown(cleanup: Cleanup): () => void {
  cleanups.push(cleanup);
  return () => {
    cleanups = cleanups.filter((registered) => registered !== cleanup);
  };
}

/**
 * Runs and clears every registered cleanup. A failing cleanup does not stop
 * the ones registered before it; the first failure is rethrown at the end.
 */
export function executeShutdownCleanup(): void {
  const pending = cleanups.reverse();
  cleanups = [];

  let failure: unknown = null;
  for (const cleanup of pending) {
    try {
      cleanup();
    } catch (error) {
      failure ??= error;
    }
  }
  if (failure !== null) {
    throw failure;
  }
}

/**
 * Runs cleanup and exits on termination signals. Ctrl+C is read as a key
 * while the interface owns the terminal, so SIGINT only arrives from
 * outside (`kill -INT`).
 */
export function installSignalHandlers(
  exit: (code: number) => void = (code) => process.exit(code),
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"]
): void {
  for (const signal of signals) {
    process.once(signal, () => {
      try {
        executeShutdownCleanup();
      } finally {
        exit(0);
      }
    });
  }
}
