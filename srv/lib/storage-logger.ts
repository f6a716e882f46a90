import cds from "@sap/cds";

const LOG = cds.log("storage-call");

export interface StorageCallEntry {
  providerKey: string;
  operation: string;
  durationMs: number;
  ok: boolean;
  errorMessage?: string;
}

/** Consecutive failure tracking per provider. */
interface FailureState {
  count: number;
  lastSuccessAt: string | null;
}

export const FAILURE_THRESHOLD = 3;
const failureCounters = new Map<string, FailureState>();

/**
 * Get the current failure state for a provider.
 */
export function getFailureState(providerKey: string): FailureState | undefined {
  return failureCounters.get(providerKey);
}

/**
 * Reset all failure counters (for testing).
 */
export function resetFailureCounters(): void {
  failureCounters.clear();
}

/**
 * Track consecutive failures; log an error once the threshold is reached.
 */
function trackProviderFailure(entry: StorageCallEntry): void {
  const state = failureCounters.get(entry.providerKey) || {
    count: 0,
    lastSuccessAt: null,
  };

  if (!entry.ok) {
    state.count++;
    failureCounters.set(entry.providerKey, state);

    if (state.count === FAILURE_THRESHOLD) {
      LOG.error(
        `Storage provider "${entry.providerKey}" has ${state.count} consecutive failures. Last success: ${state.lastSuccessAt || "never"}`,
      );
    }
  } else {
    state.count = 0;
    state.lastSuccessAt = new Date().toISOString();
    failureCounters.set(entry.providerKey, state);
  }
}

/**
 * Record one store call: debug line on success, warning on failure.
 */
export function logStorageCall(entry: StorageCallEntry): void {
  if (entry.ok) {
    LOG.debug(`${entry.providerKey}.${entry.operation} ok in ${entry.durationMs}ms`);
  } else {
    LOG.warn(
      `${entry.providerKey}.${entry.operation} failed in ${entry.durationMs}ms: ${entry.errorMessage}`,
    );
  }
  trackProviderFailure(entry);
}

/**
 * Wraps an async function to log each call with its duration and outcome.
 * Errors are logged and rethrown unchanged.
 */
export function withStorageLogging<TArgs extends unknown[], TResult>(
  providerKey: string,
  operation: string,
  fn: (...args: TArgs) => Promise<TResult>,
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    const start = Date.now();
    let ok = true;
    let errorMessage: string | undefined;

    try {
      return await fn(...args);
    } catch (err) {
      ok = false;
      errorMessage = err instanceof Error ? err.message : String(err);
      throw err;
    } finally {
      logStorageCall({
        providerKey,
        operation,
        durationMs: Date.now() - start,
        ok,
        errorMessage,
      });
    }
  };
}
