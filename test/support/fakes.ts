import { ethers } from "ethers";
import { bridgeInterface } from "../../relay/src/abis.js";
import type { Clock } from "../../relay/src/clock.js";
import {
  TransactionRejectedError,
  TransportError,
} from "../../relay/src/errors.js";
import {
  compareLogs,
  decodeEvent,
  matchesEvent,
} from "../../relay/src/events.js";
import type {
  BridgeCallName,
  BridgeCalls,
  BridgeTransactionName,
  BridgeTransactions,
  EventBatch,
  HomeChainGateway,
  RawLog,
  TargetChainGateway,
  TransactionReceipt,
} from "../../relay/src/gateway.js";
import type {
  BlockHeader,
  BridgeEventName,
  EventCursor,
  EventFilter,
  ProofResponse,
  StateProof,
} from "../../relay/src/types.js";

export const BRIDGE_ADDRESS = "0x1000000000000000000000000000000000000001";

interface StoredRequest {
  account: string;
  key: bigint;
  blockId: bigint;
  timestamp: bigint;
  served: boolean;
  reply: string;
}

type CallHandlers = {
  [K in BridgeCallName]: (args: BridgeCalls[K]["args"]) => BridgeCalls[K]["result"];
};

type SendHandlers = {
  [K in BridgeTransactionName]: (args: BridgeTransactions[K]) => TransactionReceipt;
};

/** In-process Bridge contract on C1: one block per transaction. */
export class FakeHomeChain implements HomeChainGateway {
  readonly address = BRIDGE_ADDRESS;
  readonly requests: StoredRequest[] = [];
  readonly logs: RawLog[] = [];
  readonly sent: { fn: BridgeTransactionName; args: readonly unknown[] }[] = [];
  head = 100;

  // Failure injection, consumed one per call
  readonly callFailures: Error[] = [];
  readonly sendFailures: Error[] = [];
  readonly pollFailures: Error[] = [];

  /** Leave RequestLogged out of request receipts. */
  omitRequestLogs = false;
  /** Requests other submitters add right after each of ours. */
  interleavedSubmissions = 0;
  /** getRequest on an unknown id returns an empty struct instead of reverting. */
  zeroStructForUnknown = false;
  /** Returns a revert reason to reject a verify call. */
  verifier: (requestId: bigint, proof: StateProof) => string | null = () =>
    null;

  private txCount = 0;

  private readonly callHandlers: CallHandlers = {
    getTotal: () => BigInt(this.requests.length),
    getPending: () => BigInt(this.requests.filter((r) => !r.served).length),
    getServed: () => BigInt(this.requests.filter((r) => r.served).length),
    getRequest: ([requestId]) => {
      const stored = this.requests[Number(requestId)];
      if (stored) {
        return { ...stored, reserved1: 0n, reserved2: 0n };
      }
      if (!this.zeroStructForUnknown) {
        throw new TransactionRejectedError("getRequest", "request does not exist");
      }
      return {
        account: ethers.ZeroAddress,
        key: 0n,
        blockId: 0n,
        timestamp: 0n,
        reserved1: 0n,
        reserved2: 0n,
        served: false,
        reply: "0x",
      };
    },
  };

  private readonly sendHandlers: SendHandlers = {
    request: ([account, key, blockId]) => {
      const requestId = BigInt(this.requests.length);
      const blockNumber = this.mine();
      this.requests.push({
        account: ethers.getAddress(account),
        key,
        blockId,
        timestamp: 1_700_000_000n + BigInt(blockNumber),
        served: false,
        reply: "0x",
      });
      const hash = this.nextTxHash();
      const log = this.emit(
        "RequestLogged",
        [requestId, account, key, blockId],
        blockNumber,
        hash,
      );
      this.seed(this.interleavedSubmissions);
      return {
        hash,
        blockNumber,
        logs: this.omitRequestLogs ? [] : [log],
      };
    },
    verify: ([requestId, proof]) => {
      const stored = this.requests[Number(requestId)];
      if (!stored) {
        throw new TransactionRejectedError("verify", "request does not exist");
      }
      if (stored.served) {
        throw new TransactionRejectedError("verify", "request already served");
      }
      const reason = this.verifier(requestId, proof);
      if (reason !== null) {
        throw new TransactionRejectedError("verify", reason);
      }
      stored.served = true;
      stored.reply = proof.storageValue;
      const blockNumber = this.mine();
      const hash = this.nextTxHash();
      const log = this.emit(
        "RequestServed",
        [requestId, proof.storageValue],
        blockNumber,
        hash,
      );
      return { hash, blockNumber, logs: [log] };
    },
  };

  mine(): number {
    this.head += 1;
    return this.head;
  }

  emit(
    event: BridgeEventName,
    values: readonly unknown[],
    blockNumber: number = this.mine(),
    transactionHash: string = this.nextTxHash(),
  ): RawLog {
    const { topics, data } = bridgeInterface.encodeEventLog(event, values);
    const log: RawLog = {
      address: this.address,
      topics,
      data,
      blockNumber,
      index: this.logs.filter((l) => l.blockNumber === blockNumber).length,
      transactionHash,
    };
    this.logs.push(log);
    return log;
  }

  /** Adds pending requests without going through sendTransaction. */
  seed(count: number, account = "0x2000000000000000000000000000000000000002"): void {
    for (let i = 0; i < count; i++) {
      this.requests.push({
        account,
        key: BigInt(i),
        blockId: 1n,
        timestamp: 1_700_000_000n,
        served: false,
        reply: "0x",
      });
    }
  }

  sentCount(fn: BridgeTransactionName): number {
    return this.sent.filter((s) => s.fn === fn).length;
  }

  async call<F extends BridgeCallName>(
    fn: F,
    args: BridgeCalls[F]["args"],
  ): Promise<BridgeCalls[F]["result"]> {
    const failure = this.callFailures.shift();
    if (failure) throw failure;
    return this.callHandlers[fn](args);
  }

  async sendTransaction<F extends BridgeTransactionName>(
    fn: F,
    args: BridgeTransactions[F],
  ): Promise<TransactionReceipt> {
    const failure = this.sendFailures.shift();
    if (failure) throw failure;
    this.sent.push({ fn, args: [...args] });
    return this.sendHandlers[fn](args);
  }

  async latestCursor(): Promise<EventCursor> {
    return this.head + 1;
  }

  async pollEvents<E extends BridgeEventName>(
    event: E,
    filter: EventFilter,
    cursor: EventCursor,
  ): Promise<EventBatch<E>> {
    const failure = this.pollFailures.shift();
    if (failure) throw failure;

    const head = this.head;
    const events = this.logs
      .filter(
        (log) =>
          log.blockNumber >= cursor &&
          log.blockNumber <= head &&
          matchesEvent(log, event, filter, this.address),
      )
      .sort(compareLogs)
      .map((log) => decodeEvent(event, log));
    return { events, cursor: Math.max(cursor, head + 1) };
  }

  private nextTxHash(): string {
    this.txCount += 1;
    return ethers.id(`tx-${this.txCount}`);
  }
}

/** In-process C2 node serving headers and storage proofs from a map. */
export class FakeTargetChain implements TargetChainGateway {
  readonly storage = new Map<string, bigint>();
  readonly blockRequests: bigint[] = [];
  readonly proofRequests: {
    account: string;
    keys: bigint[];
    blockId: bigint;
  }[] = [];
  /** Accounts whose proofs come back without storage entries. */
  readonly missingProofFor = new Set<string>();
  /** Number of upcoming calls that fail with a TransportError. */
  failures = 0;

  set(account: string, key: bigint, blockId: bigint, value: bigint): void {
    this.storage.set(slotId(account, key, blockId), value);
  }

  async getBlock(blockId: bigint): Promise<BlockHeader> {
    this.maybeFail("eth_getBlockByNumber");
    this.blockRequests.push(blockId);
    return {
      number: blockId,
      hash: ethers.id(`block-${blockId}`),
      stateRoot: stateRootAt(blockId),
    };
  }

  async getProof(
    account: string,
    keys: readonly bigint[],
    blockId: bigint,
  ): Promise<ProofResponse> {
    this.maybeFail("eth_getProof");
    this.proofRequests.push({ account, keys: [...keys], blockId });
    const missing = this.missingProofFor.has(account.toLowerCase());
    return {
      address: account.toLowerCase(),
      accountProof: [ethers.id(`account-node-${account.toLowerCase()}`)],
      balance: "0x0",
      codeHash: ethers.id("code"),
      nonce: "0x1",
      storageHash: storageHashOf(account, blockId),
      storageProof: missing
        ? []
        : keys.map((key) => ({
            key: ethers.toQuantity(key),
            value: ethers.toQuantity(
              this.storage.get(slotId(account, key, blockId)) ?? 0n,
            ),
            proof: [ethers.id(`storage-node-${key}`)],
          })),
    };
  }

  private maybeFail(method: string): void {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransportError(`${method} failed: connection reset`);
    }
  }
}

function slotId(account: string, key: bigint, blockId: bigint): string {
  return `${account.toLowerCase()}:${key}:${blockId}`;
}

export function stateRootAt(blockId: bigint): string {
  return ethers.id(`state-${blockId}`);
}

export function storageHashOf(account: string, blockId: bigint): string {
  return ethers.id(`storage-${account.toLowerCase()}-${blockId}`);
}

/** Clock whose sleeps only end when the test advances time. */
export class ManualClock implements Clock {
  private time = 0;
  private timers: { at: number; resolve: () => void }[] = [];

  now(): number {
    return this.time;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const timer = { at: this.time + ms, resolve };
      this.timers.push(timer);
      signal?.addEventListener(
        "abort",
        () => {
          this.timers = this.timers.filter((t) => t !== timer);
          resolve();
        },
        { once: true },
      );
    });
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  advance(ms: number): void {
    this.time += ms;
    const due = this.timers.filter((t) => t.at <= this.time);
    this.timers = this.timers.filter((t) => t.at > this.time);
    for (const timer of due) timer.resolve();
  }
}

export const instantClock: Clock = {
  now: () => 0,
  sleep: async () => undefined,
};

/** Lets pending promise chains run to completion. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export async function waitFor(
  condition: () => boolean,
  rounds = 100,
): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    if (condition()) return;
    await flush(1);
  }
  throw new Error("condition not met");
}

export async function rejectsWith<T extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => T,
): Promise<T> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected rejection with ${type.name}`);
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function sampleProof(storageValue: string): StateProof {
  return {
    stateRoot: stateRootAt(1n),
    account: "0x2000000000000000000000000000000000000002",
    accountProof: [ethers.id("account-node")],
    storageHash: ethers.id("storage"),
    storageKey: ethers.zeroPadValue("0x01", 32),
    storageValue,
    storageProof: [ethers.id("storage-node")],
  };
}
