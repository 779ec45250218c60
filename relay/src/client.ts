import { ethers } from "ethers";
import type { Config } from "./config.js";
import { InvalidRequestError, errorMessage } from "./errors.js";
import { eventsIn } from "./events.js";
import type { HomeChainGateway } from "./gateway.js";
import type { StatusQuery } from "./status.js";
import type { RequestLifecycleTracker } from "./tracker.js";

export interface ReadRequest {
  account: string;
  key: bigint;
  blockId: bigint;
}

export interface SubmitOptions {
  /** Overrides config.waitTimeoutMs. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called once the request id is known, before waiting starts. */
  onSubmitted?: (requestId: bigint) => void | Promise<void>;
}

export interface SubmitResult {
  requestId: bigint;
  reply: string;
}

export interface BridgeClient {
  submitRequest(
    request: ReadRequest,
    options?: SubmitOptions,
  ): Promise<SubmitResult>;
}

export function validateReadRequest(request: ReadRequest): ReadRequest {
  if (!ethers.isAddress(request.account)) {
    throw new InvalidRequestError(`Invalid account: ${request.account}`);
  }
  if (request.key < 0n || request.key > ethers.MaxUint256) {
    throw new InvalidRequestError(`Invalid key: ${request.key}`);
  }
  if (request.blockId < 0n || request.blockId > ethers.MaxUint256) {
    throw new InvalidRequestError(`Invalid blockId: ${request.blockId}`);
  }
  return { ...request, account: ethers.getAddress(request.account) };
}

/**
 * Submits read requests on C1 and waits for their replies. Replies arrive
 * through the tracker, fed by the served-event dispatcher.
 */
export function createClient(deps: {
  config: Pick<Config, "bridgeAddress" | "waitTimeoutMs">;
  home: HomeChainGateway;
  tracker: RequestLifecycleTracker;
  status: StatusQuery;
}): BridgeClient {
  const { config, home, tracker, status } = deps;

  async function deriveRequestId(
    logged: { requestId: bigint }[],
    txHash: string,
  ): Promise<bigint> {
    if (logged.length > 0) {
      return logged[0].requestId;
    }
    // Only correct when no other submitter interleaved with ours
    console.warn(
      `[bot] No RequestLogged event in tx ${txHash}, falling back to getTotal() - 1`,
    );
    return (await status.getTotal()) - 1n;
  }

  return {
    async submitRequest(request, options = {}) {
      const { account, key, blockId } = validateReadRequest(request);
      options.signal?.throwIfAborted();

      const receipt = await home.sendTransaction("request", [
        account,
        key,
        blockId,
        0n,
        0n,
      ]);
      const requestId = await deriveRequestId(
        eventsIn(receipt, "RequestLogged", config.bridgeAddress),
        receipt.hash,
      );

      // Another caller may hold the same id when it came from the counter
      tracker.retain(requestId);
      console.log(
        `[bot] Request created (id: ${requestId}): account ${account}, key ${key}, block ${blockId}`,
      );

      try {
        await options.onSubmitted?.(requestId);

        // The reply may already be on-chain if the relay beat us here
        try {
          const current = await status.getRequest(requestId);
          if (current.reply !== null) {
            tracker.recordServed(requestId, current.reply);
          }
        } catch (err) {
          console.warn(
            `[bot] Could not read request ${requestId}, waiting for its event: ${errorMessage(err)}`,
          );
        }

        const reply = await tracker.awaitServed(requestId, {
          timeoutMs: options.timeoutMs ?? config.waitTimeoutMs,
          signal: options.signal,
        });
        return { requestId, reply };
      } finally {
        tracker.release(requestId);
      }
    },
  };
}
