import { RequestReleasedError, WaitTimeoutError } from "./errors.js";
import type { RequestStatus } from "./types.js";

// Largest delay setTimeout honours
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface AwaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  resolve(reply: string): void;
  reject(reason: unknown): void;
}

interface Entry {
  status: RequestStatus;
  reply: string | null;
  waiters: Set<Waiter>;
  holders: number;
}

/**
 * Pending → Served state machine per request id. Each id owns its own waiter
 * set, so serving one id never settles a wait on another.
 */
export class RequestLifecycleTracker {
  private readonly entries = new Map<bigint, Entry>();

  get size(): number {
    return this.entries.size;
  }

  status(requestId: bigint): RequestStatus | undefined {
    return this.entries.get(requestId)?.status;
  }

  /** Returns false if the id is already tracked. */
  recordSubmission(requestId: bigint): boolean {
    if (this.entries.has(requestId)) return false;
    this.entries.set(requestId, {
      status: "pending",
      reply: null,
      waiters: new Set(),
      holders: 1,
    });
    return true;
  }

  /**
   * Takes a hold on the id, tracking it if new. Several callers may hold the
   * same id; each pairs its retain with one release.
   */
  retain(requestId: bigint): void {
    const entry = this.entries.get(requestId);
    if (entry) {
      entry.holders += 1;
      return;
    }
    this.recordSubmission(requestId);
  }

  /** Returns false for an untracked or already served id. */
  recordServed(requestId: bigint, reply: string): boolean {
    const entry = this.entries.get(requestId);
    if (!entry || entry.status === "served") return false;

    entry.status = "served";
    entry.reply = reply;
    for (const waiter of [...entry.waiters]) {
      waiter.resolve(reply);
    }
    return true;
  }

  awaitServed(requestId: bigint, options: AwaitOptions = {}): Promise<string> {
    const entry = this.entries.get(requestId);
    if (!entry) {
      return Promise.reject(new Error(`Request ${requestId} is not tracked`));
    }
    if (entry.reply !== null) {
      return Promise.resolve(entry.reply);
    }

    const { timeoutMs, signal } = options;
    if (timeoutMs !== undefined && timeoutMs > MAX_TIMEOUT_MS) {
      return Promise.reject(
        new RangeError(`timeoutMs must be at most ${MAX_TIMEOUT_MS}`),
      );
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<string>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = () => {
        entry.waiters.delete(waiter);
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const waiter: Waiter = {
        resolve(reply) {
          cleanup();
          resolve(reply);
        },
        reject(reason) {
          cleanup();
          reject(reason);
        },
      };
      const onAbort = () => waiter.reject(signal?.reason);

      entry.waiters.add(waiter);
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () => waiter.reject(new WaitTimeoutError(requestId, timeoutMs)),
          timeoutMs,
        );
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Drops one hold. The last release forgets the id, failing any wait still
   * outstanding on it.
   */
  release(requestId: bigint): void {
    const entry = this.entries.get(requestId);
    if (!entry) return;
    entry.holders -= 1;
    if (entry.holders > 0) return;
    this.entries.delete(requestId);
    for (const waiter of [...entry.waiters]) {
      waiter.reject(new RequestReleasedError(requestId));
    }
  }
}
