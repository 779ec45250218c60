import { ethers } from "ethers";
import { BRIDGE_ABI } from "./abis.js";
import type { Config } from "./config.js";
import {
  BridgeError,
  TransactionRejectedError,
  TransportError,
  errorMessage,
} from "./errors.js";
import { compareLogs, decodeEvent, eventTopics } from "./events.js";
import type {
  BridgeCallName,
  BridgeCalls,
  BridgeTransactionName,
  BridgeTransactions,
  EventBatch,
  HomeChainGateway,
  TransactionReceipt,
} from "./gateway.js";
import type { BridgeEventName, EventCursor, EventFilter } from "./types.js";

type CallDecoders = {
  [K in BridgeCallName]: (result: ethers.Result) => BridgeCalls[K]["result"];
};

const CALL_DECODERS: CallDecoders = {
  getTotal: (r) => ethers.getBigInt(r[0]),
  getPending: (r) => ethers.getBigInt(r[0]),
  getServed: (r) => ethers.getBigInt(r[0]),
  getRequest: (r) => ({
    account: ethers.getAddress(r[0]),
    key: ethers.getBigInt(r[1]),
    blockId: ethers.getBigInt(r[2]),
    timestamp: ethers.getBigInt(r[3]),
    reserved1: ethers.getBigInt(r[4]),
    reserved2: ethers.getBigInt(r[5]),
    served: r[6] === true,
    reply: ethers.hexlify(r[7]),
  }),
};

export function toGatewayError(operation: string, err: unknown): BridgeError {
  if (err instanceof BridgeError) return err;
  if (ethers.isError(err, "CALL_EXCEPTION")) {
    return new TransactionRejectedError(operation, err.reason, { cause: err });
  }
  return new TransportError(`${operation} failed: ${errorMessage(err)}`, {
    cause: err,
  });
}

/** Bridge contract on C1, signed by the process wallet. */
export class EthersHomeGateway implements HomeChainGateway {
  readonly provider: ethers.JsonRpcProvider;
  readonly wallet: ethers.Wallet;
  // Relay and bot may share the wallet in one process
  private readonly signer: ethers.NonceManager;
  private readonly bridge: ethers.Contract;
  private readonly bridgeAddress: string;
  private readonly confirmations: number;
  private readonly maxLogRange: number;

  constructor(
    config: Pick<
      Config,
      | "homeRpcUrl"
      | "signerPrivateKey"
      | "bridgeAddress"
      | "receiptConfirmations"
      | "maxLogRange"
    >,
  ) {
    this.provider = new ethers.JsonRpcProvider(config.homeRpcUrl);
    this.wallet = new ethers.Wallet(config.signerPrivateKey, this.provider);
    this.signer = new ethers.NonceManager(this.wallet);
    this.bridge = new ethers.Contract(
      config.bridgeAddress,
      BRIDGE_ABI,
      this.signer,
    );
    this.bridgeAddress = config.bridgeAddress;
    this.confirmations = config.receiptConfirmations;
    this.maxLogRange = config.maxLogRange;
  }

  async call<F extends BridgeCallName>(
    fn: F,
    args: BridgeCalls[F]["args"],
  ): Promise<BridgeCalls[F]["result"]> {
    let result: ethers.Result;
    try {
      result = await this.bridge.getFunction(fn).staticCallResult(...args);
    } catch (err) {
      throw toGatewayError(fn, err);
    }
    try {
      return CALL_DECODERS[fn](result);
    } catch (err) {
      throw new TransportError(
        `Malformed ${fn} result: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async sendTransaction<F extends BridgeTransactionName>(
    fn: F,
    args: BridgeTransactions[F],
  ): Promise<TransactionReceipt> {
    const method = this.bridge.getFunction(fn);

    // Estimate gas first to catch reverts cheaply
    let gasEstimate: bigint;
    try {
      gasEstimate = await method.estimateGas(...args);
    } catch (err) {
      throw toGatewayError(fn, err);
    }

    let tx: ethers.ContractTransactionResponse;
    try {
      // Submit with 20% gas buffer
      tx = await method.send(...args, {
        gasLimit: (gasEstimate * 120n) / 100n,
      });
    } catch (err) {
      // The nonce may not have been consumed; resync from the node
      this.signer.reset();
      throw toGatewayError(fn, err);
    }

    console.log(`[c1] Submitted ${fn} tx ${tx.hash}`);

    let receipt: ethers.TransactionReceipt | null;
    try {
      receipt = await tx.wait(this.confirmations);
    } catch (err) {
      throw toGatewayError(fn, err);
    }
    if (!receipt) {
      throw new TransportError(`No receipt for ${fn} tx ${tx.hash}`);
    }
    if (receipt.status === 0) {
      throw new TransactionRejectedError(fn, `tx ${tx.hash} reverted`);
    }

    return {
      hash: receipt.hash,
      blockNumber: receipt.blockNumber,
      logs: receipt.logs,
    };
  }

  async latestCursor(): Promise<EventCursor> {
    try {
      return (await this.provider.getBlockNumber()) + 1;
    } catch (err) {
      throw toGatewayError("getBlockNumber", err);
    }
  }

  async pollEvents<E extends BridgeEventName>(
    event: E,
    filter: EventFilter,
    cursor: EventCursor,
  ): Promise<EventBatch<E>> {
    let logs: ethers.Log[];
    let toBlock: number;
    try {
      const head = await this.provider.getBlockNumber();
      if (head < cursor) {
        return { events: [], cursor };
      }
      toBlock = Math.min(head, cursor + this.maxLogRange - 1);
      logs = await this.provider.getLogs({
        address: this.bridgeAddress,
        topics: eventTopics(event, filter),
        fromBlock: cursor,
        toBlock,
      });
    } catch (err) {
      throw toGatewayError(`getLogs(${event})`, err);
    }

    const events = [...logs]
      .sort(compareLogs)
      .map((log) => decodeEvent(event, log));
    return { events, cursor: toBlock + 1 };
  }
}
