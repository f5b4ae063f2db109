/**
 * Sliding window operation counter.
 *
 * Keeps the timestamps of recent operations sorted ascending. A timestamp may
 * lie slightly in the future: it reserves the slot of an operation that was
 * admitted with a proactive delay and is still sleeping it out.
 */

export interface WindowSnapshot {
  /** Operations counted in the window (reservations included) */
  load: number;
  /** Retained timestamps, oldest first */
  timestamps: readonly number[];
}

export interface WindowCounter {
  /** Records an operation (or a reservation) at the given time */
  record: (timestamp?: number) => void;
  /** Removes one previously recorded timestamp, returns false if absent */
  release: (timestamp: number) => boolean;
  /** Number of timestamps still inside the window */
  load: (now?: number) => number;
  /** Pruned view of the window */
  snapshot: (now?: number) => WindowSnapshot;
  /** Drops every timestamp */
  clear: () => void;
}

/**
 * Creates a window counter.
 *
 * @param getWindowMs - Reads the live window length, which may change when
 * provider feedback updates the limits.
 */
export const createWindowCounter = (getWindowMs: () => number): WindowCounter => {
  let timestamps: number[] = [];

  const prune = (now: number): void => {
    const cutoff = now - getWindowMs();
    let stale = 0;
    while (stale < timestamps.length && timestamps[stale] <= cutoff) {
      stale++;
    }
    if (stale > 0) {
      timestamps = timestamps.slice(stale);
    }
  };

  const record = (timestamp: number = Date.now()): void => {
    // Binary search for the insertion point keeps the sequence sorted
    let low = 0;
    let high = timestamps.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (timestamps[mid] <= timestamp) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    timestamps.splice(low, 0, timestamp);
  };

  const release = (timestamp: number): boolean => {
    const index = timestamps.lastIndexOf(timestamp);
    if (index === -1) {
      return false;
    }
    timestamps.splice(index, 1);
    return true;
  };

  const load = (now: number = Date.now()): number => {
    prune(now);
    return timestamps.length;
  };

  const snapshot = (now: number = Date.now()): WindowSnapshot => {
    prune(now);
    return { load: timestamps.length, timestamps: [...timestamps] };
  };

  const clear = (): void => {
    timestamps = [];
  };

  return {
    record,
    release,
    load,
    snapshot,
    clear,
  };
};
