import type {
  BlockHeader,
  BridgeEventName,
  BridgeEvents,
  EventCursor,
  EventFilter,
  ProofResponse,
  StateProof,
} from "./types.js";

// Raw result of Bridge.getRequest
export interface BridgeRequestRecord {
  account: string;
  key: bigint;
  blockId: bigint;
  timestamp: bigint; // seconds
  reserved1: bigint;
  reserved2: bigint;
  served: boolean;
  reply: string;
}

export interface BridgeCalls {
  getTotal: { args: []; result: bigint };
  getPending: { args: []; result: bigint };
  getServed: { args: []; result: bigint };
  getRequest: { args: [requestId: bigint]; result: BridgeRequestRecord };
}

export interface BridgeTransactions {
  request: [
    account: string,
    key: bigint,
    blockId: bigint,
    reserved1: bigint,
    reserved2: bigint,
  ];
  verify: [requestId: bigint, proof: StateProof];
}

export type BridgeCallName = keyof BridgeCalls;
export type BridgeTransactionName = keyof BridgeTransactions;

// Subset of ethers.Log the decoders need
export interface RawLog {
  address: string;
  topics: readonly string[];
  data: string;
  blockNumber: number;
  index: number;
  transactionHash: string;
}

export interface TransactionReceipt {
  hash: string;
  blockNumber: number;
  logs: readonly RawLog[];
}

export interface EventBatch<E extends BridgeEventName> {
  events: BridgeEvents[E][];
  cursor: EventCursor;
}

/**
 * C1 capabilities. Reverts surface as TransactionRejectedError, everything
 * else that goes wrong on the wire as TransportError.
 */
export interface HomeChainGateway {
  call<F extends BridgeCallName>(
    fn: F,
    args: BridgeCalls[F]["args"],
  ): Promise<BridgeCalls[F]["result"]>;

  /** Submits a signed transaction and resolves once its receipt is confirmed. */
  sendTransaction<F extends BridgeTransactionName>(
    fn: F,
    args: BridgeTransactions[F],
  ): Promise<TransactionReceipt>;

  /** Cursor positioned after the current head ("from now on"). */
  latestCursor(): Promise<EventCursor>;

  /**
   * Events emitted at or after `cursor`, in block and log order. The returned
   * cursor points past the last block scanned.
   */
  pollEvents<E extends BridgeEventName>(
    event: E,
    filter: EventFilter,
    cursor: EventCursor,
  ): Promise<EventBatch<E>>;
}

/** C2 capabilities: read-only. */
export interface TargetChainGateway {
  getBlock(blockId: bigint): Promise<BlockHeader>;
  getProof(
    account: string,
    keys: readonly bigint[],
    blockId: bigint,
  ): Promise<ProofResponse>;
}
