export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export interface LoopHandle {
  readonly signal: AbortSignal;
  /** Stops scheduling and resolves once the running tick has finished. */
  stop(): Promise<void>;
}

/**
 * Runs `tick` every `intervalMs` until stopped. Errors thrown by a tick are
 * logged and the loop carries on at the next interval.
 */
export function startLoop(
  name: string,
  intervalMs: number,
  tick: (signal: AbortSignal) => Promise<void>,
  clock: Clock = systemClock,
): LoopHandle {
  const controller = new AbortController();
  const { signal } = controller;

  async function loop(): Promise<void> {
    while (!signal.aborted) {
      try {
        await tick(signal);
      } catch (err) {
        console.error(`${name} loop error:`, err);
      }
      await clock.sleep(intervalMs, signal);
    }
  }

  const done = loop().catch((err) => {
    console.error(`${name} fatal error:`, err);
    process.exit(1);
  });

  return {
    signal,
    async stop() {
      controller.abort();
      await done;
    },
  };
}
