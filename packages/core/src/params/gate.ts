import pLimit from "p-limit";

/**
 * Gate around network transfers. At most one callback passed to `run`
 * executes at a time; the rest queue in call order.
 */
export interface DownloadGate {
  run<T>(fn: () => Promise<T>): Promise<T>;
  /** Callbacks currently executing. */
  readonly activeCount: number;
  /** Callbacks waiting for the permit. */
  readonly pendingCount: number;
}

export function createDownloadGate(): DownloadGate {
  const limit = pLimit(1);

  return {
    run<T>(fn: () => Promise<T>): Promise<T> {
      return limit(fn);
    },
    get activeCount() {
      return limit.activeCount;
    },
    get pendingCount() {
      return limit.pendingCount;
    },
  };
}
