import { startLoop, systemClock, type Clock, type LoopHandle } from "./clock.js";
import type { Config } from "./config.js";
import type { HomeChainGateway } from "./gateway.js";
import type { RequestLifecycleTracker } from "./tracker.js";
import type { EventCursor } from "./types.js";

export interface ServedDispatcher {
  /** Delivers new RequestServed events; returns how many reached a waiter. */
  pollOnce(): Promise<number>;
  start(): LoopHandle;
}

/**
 * One RequestServed subscription for the whole process, fanned out to
 * tracker waiters by request id. Events for ids nobody tracks are ignored.
 */
export function createServedDispatcher(deps: {
  config: Pick<Config, "pollIntervalMs">;
  home: HomeChainGateway;
  tracker: RequestLifecycleTracker;
  clock?: Clock;
}): ServedDispatcher {
  const { config, home, tracker } = deps;
  let cursor: EventCursor | null = null;

  async function pollOnce(): Promise<number> {
    if (cursor === null) {
      cursor = await home.latestCursor();
    }
    const batch = await home.pollEvents("RequestServed", {}, cursor);
    cursor = batch.cursor;

    let delivered = 0;
    for (const event of batch.events) {
      if (tracker.recordServed(event.requestId, event.reply)) {
        console.log(`[bot] Request ${event.requestId} served (reply: ${event.reply})`);
        delivered++;
      }
    }
    return delivered;
  }

  return {
    pollOnce,
    start() {
      return startLoop(
        "Dispatcher",
        config.pollIntervalMs,
        async () => {
          await pollOnce();
        },
        deps.clock ?? systemClock,
      );
    },
  };
}
