import { ethers } from "ethers";
import {
  bridgeInterface,
  REQUEST_LOGGED_TOPIC0,
  REQUEST_SERVED_TOPIC0,
} from "./abis.js";
import { TransportError, errorMessage } from "./errors.js";
import type { RawLog, TransactionReceipt } from "./gateway.js";
import type { BridgeEventName, BridgeEvents, EventFilter } from "./types.js";

export const EVENT_TOPICS: Record<BridgeEventName, string> = {
  RequestLogged: REQUEST_LOGGED_TOPIC0,
  RequestServed: REQUEST_SERVED_TOPIC0,
};

type EventDecoders = {
  [K in BridgeEventName]: (args: ethers.Result, log: RawLog) => BridgeEvents[K];
};

const EVENT_DECODERS: EventDecoders = {
  RequestLogged: (args, log) => ({
    requestId: ethers.getBigInt(args[0]),
    account: ethers.getAddress(args[1]),
    key: ethers.getBigInt(args[2]),
    blockId: ethers.getBigInt(args[3]),
    blockNumber: log.blockNumber,
    logIndex: log.index,
    transactionHash: log.transactionHash,
  }),
  RequestServed: (args, log) => ({
    requestId: ethers.getBigInt(args[0]),
    reply: ethers.hexlify(args[1]),
    blockNumber: log.blockNumber,
    logIndex: log.index,
    transactionHash: log.transactionHash,
  }),
};

export function decodeEvent<E extends BridgeEventName>(
  event: E,
  log: RawLog,
): BridgeEvents[E] {
  let args: ethers.Result;
  try {
    args = bridgeInterface.decodeEventLog(event, log.data, log.topics);
  } catch (err) {
    throw new TransportError(
      `Malformed ${event} log in tx ${log.transactionHash}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return EVENT_DECODERS[event](args, log);
}

/** Topic filter for eth_getLogs: [topic0, requestId?]. */
export function eventTopics(
  event: BridgeEventName,
  filter: EventFilter,
): string[] {
  const topics = [EVENT_TOPICS[event]];
  if (filter.requestId !== undefined) {
    topics.push(ethers.zeroPadValue(ethers.toBeHex(filter.requestId), 32));
  }
  return topics;
}

export function matchesEvent(
  log: RawLog,
  event: BridgeEventName,
  filter: EventFilter,
  address: string,
): boolean {
  if (log.address.toLowerCase() !== address.toLowerCase()) return false;
  return eventTopics(event, filter).every(
    (topic, i) => log.topics[i]?.toLowerCase() === topic.toLowerCase(),
  );
}

export function compareLogs(a: RawLog, b: RawLog): number {
  return a.blockNumber - b.blockNumber || a.index - b.index;
}

/** Bridge events of one kind emitted by a confirmed transaction. */
export function eventsIn<E extends BridgeEventName>(
  receipt: TransactionReceipt,
  event: E,
  bridgeAddress: string,
): BridgeEvents[E][] {
  return receipt.logs
    .filter((log) => matchesEvent(log, event, {}, bridgeAddress))
    .sort(compareLogs)
    .map((log) => decodeEvent(event, log));
}
