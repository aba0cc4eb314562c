/**
 * Per-key mutual exclusion.
 *
 * Callers holding the same key run one at a time in arrival order; different
 * keys never wait on each other. Each key keeps a promise chain, dropped once
 * its last caller finishes.
 */

import { QueueFullError } from "./errors";

export interface KeyedMutexOptions {
  /** Maximum callers (running + waiting) per key (default: 1000) */
  maxQueueDepth?: number;
}

interface KeyState {
  tail: Promise<void>;
  pending: number;
}

export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();
  private readonly maxQueueDepth: number;

  constructor(options: KeyedMutexOptions = {}) {
    this.maxQueueDepth = options.maxQueueDepth ?? 1000;
  }

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const state = this.keys.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    if (state.pending >= this.maxQueueDepth) {
      throw new QueueFullError(key, this.maxQueueDepth);
    }
    state.pending++;
    this.keys.set(key, state);

    const run = state.tail.then(() => fn());
    state.tail = run.then(
      () => undefined,
      () => undefined
    );

    try {
      return await run;
    } finally {
      state.pending--;
      if (state.pending === 0) this.keys.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.keys.has(key);
  }

  /** Number of keys with a running or waiting caller. */
  get activeKeys(): number {
    return this.keys.size;
  }
}
