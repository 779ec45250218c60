import { ethers } from "ethers";
import { NotFoundError, TransactionRejectedError } from "./errors.js";
import type { BridgeRequestRecord, HomeChainGateway } from "./gateway.js";
import type { BridgeRequest } from "./types.js";

export interface StatusQuery {
  getTotal(): Promise<bigint>;
  getPending(): Promise<bigint>;
  getServed(): Promise<bigint>;
  /** Throws NotFoundError for ids the Bridge has never assigned. */
  getRequest(requestId: bigint): Promise<BridgeRequest>;
}

// Read path straight against the contract; nothing is cached.
export function createStatusQuery(home: HomeChainGateway): StatusQuery {
  return {
    getTotal: () => home.call("getTotal", []),
    getPending: () => home.call("getPending", []),
    getServed: () => home.call("getServed", []),

    async getRequest(requestId: bigint): Promise<BridgeRequest> {
      if (requestId < 0n || requestId > ethers.MaxUint256) {
        throw new NotFoundError(requestId);
      }

      let record: BridgeRequestRecord;
      try {
        record = await home.call("getRequest", [requestId]);
      } catch (err) {
        if (err instanceof TransactionRejectedError) {
          throw new NotFoundError(requestId, { cause: err });
        }
        throw err;
      }

      // Some deployments return an empty struct instead of reverting
      if (record.account === ethers.ZeroAddress && record.timestamp === 0n) {
        throw new NotFoundError(requestId);
      }

      return {
        requestId,
        account: record.account,
        key: record.key,
        blockId: record.blockId,
        submittedAt: new Date(Number(record.timestamp) * 1000),
        status: record.served ? "served" : "pending",
        reply: record.served ? record.reply : null,
      };
    },
  };
}
