import { ethers } from "ethers";
import { startLoop, systemClock, type Clock, type LoopHandle } from "./clock.js";
import type { Config } from "./config.js";
import {
  ProofConstructionError,
  TransportError,
  errorMessage,
} from "./errors.js";
import type {
  HomeChainGateway,
  TargetChainGateway,
  TransactionReceipt,
} from "./gateway.js";
import { assembleStateProof, storageSlot } from "./proof.js";
import type { Store } from "./store.js";
import type { RequestLifecycleTracker } from "./tracker.js";
import type { EventCursor, RequestLoggedEvent, StateProof } from "./types.js";

export type RelayOutcome = "served" | "skipped" | "failed";

export interface RelayDeps {
  config: Pick<Config, "pollIntervalMs" | "maxRetries" | "retryDelayMs">;
  home: HomeChainGateway;
  target: TargetChainGateway;
  tracker: RequestLifecycleTracker;
  journal: Store;
  clock?: Clock;
}

export interface Relay {
  /** Fetches new RequestLogged events and serves them one at a time. */
  pollOnce(signal?: AbortSignal): Promise<number>;
  handleRequest(event: RequestLoggedEvent): Promise<RelayOutcome>;
  start(): LoopHandle;
}

class VerifySubmissionError extends Error {}

export function createRelay(deps: RelayDeps): Relay {
  const { config, home, target, tracker, journal } = deps;
  const clock = deps.clock ?? systemClock;

  let cursor: EventCursor | null = null;

  async function buildProof(event: RequestLoggedEvent): Promise<StateProof> {
    storageSlot(event.key);

    const header = await target.getBlock(event.blockId);
    if (header.number !== event.blockId) {
      throw new ProofConstructionError(
        `C2 returned block ${header.number} for block ${event.blockId}`,
      );
    }

    const response = await target.getProof(
      event.account,
      [event.key],
      event.blockId,
    );
    if (ethers.getAddress(response.address) !== ethers.getAddress(event.account)) {
      throw new ProofConstructionError(
        `Proof is for ${response.address}, requested ${event.account}`,
      );
    }

    return assembleStateProof(header, response, event.key);
  }

  async function serve(
    event: RequestLoggedEvent,
  ): Promise<{ proof: StateProof; receipt: TransactionReceipt }> {
    const proof = await buildProof(event);
    try {
      const receipt = await home.sendTransaction("verify", [
        event.requestId,
        proof,
      ]);
      return { proof, receipt };
    } catch (err) {
      // Never resubmit verify: the first one may still land
      throw new VerifySubmissionError(errorMessage(err), { cause: err });
    }
  }

  // Returns null once the request has been journaled as failed
  async function serveWithRetries(
    event: RequestLoggedEvent,
    id: string,
  ): Promise<{ proof: StateProof; receipt: TransactionReceipt; attempts: number } | null> {
    for (let attempt = 1; ; attempt++) {
      try {
        return { ...(await serve(event)), attempts: attempt };
      } catch (err) {
        const message = errorMessage(err);
        const retryable =
          err instanceof TransportError && attempt <= config.maxRetries;

        if (retryable) {
          console.warn(
            `[relay] Attempt ${attempt} for request ${id} failed, retrying in ${config.retryDelayMs}ms: ${message}`,
          );
          journal.updateJob(id, { error: message, attempts: attempt });
          await clock.sleep(config.retryDelayMs);
          continue;
        }

        // Dropped: the request stays Pending on C1
        console.error(`[relay] Request ${id} failed:`, message);
        journal.updateJob(id, {
          status: "failed",
          error: message,
          attempts: attempt,
        });
        return null;
      }
    }
  }

  async function handleRequest(
    event: RequestLoggedEvent,
  ): Promise<RelayOutcome> {
    const id = event.requestId.toString();

    // Idempotent: a replayed event must not produce a second verify. The
    // tracker covers requests in flight, the journal everything after.
    if (tracker.status(event.requestId) !== undefined || journal.getJob(id)) {
      console.log(`[relay] Request ${id} already handled, skipping`);
      return "skipped";
    }

    tracker.recordSubmission(event.requestId);
    try {
      const now = new Date().toISOString();
      journal.createJob({
        requestId: id,
        account: event.account,
        key: event.key.toString(),
        blockId: event.blockId.toString(),
        status: "processing",
        reply: null,
        verifyTxHash: null,
        error: null,
        attempts: 0,
        createdAt: now,
        servedAt: null,
        updatedAt: now,
      });

      console.log(
        `[relay] Request ${id}: account ${event.account}, key ${event.key}, block ${event.blockId}`,
      );

      const result = await serveWithRetries(event, id);
      if (!result) return "failed";

      const { proof, receipt, attempts } = result;
      tracker.recordServed(event.requestId, proof.storageValue);
      journal.updateJob(id, {
        status: "served",
        reply: proof.storageValue,
        verifyTxHash: receipt.hash,
        error: null,
        attempts,
        servedAt: new Date().toISOString(),
      });

      console.log(
        `[relay] Request ${id} has been served (value: ${proof.storageValue}, tx ${receipt.hash})`,
      );
      return "served";
    } finally {
      tracker.release(event.requestId);
    }
  }

  async function pollOnce(signal?: AbortSignal): Promise<number> {
    if (cursor === null) {
      cursor = await home.latestCursor();
      console.log(`[relay] Watching RequestLogged from block ${cursor}`);
    }

    // A failed fetch leaves the cursor in place for the next cycle
    const batch = await home.pollEvents("RequestLogged", {}, cursor);
    cursor = batch.cursor;

    let handled = 0;
    for (const event of batch.events) {
      if (signal?.aborted) {
        console.warn(
          `[relay] Stopping with ${batch.events.length - handled} unprocessed request(s)`,
        );
        break;
      }
      try {
        await handleRequest(event);
      } catch (err) {
        // The cursor is already past this batch
        console.error(`[relay] Could not handle request ${event.requestId}:`, err);
      }
      handled++;
    }
    return handled;
  }

  return {
    pollOnce,
    handleRequest,
    start() {
      return startLoop(
        "Relay",
        config.pollIntervalMs,
        async (signal) => {
          await pollOnce(signal);
        },
        clock,
      );
    },
  };
}
