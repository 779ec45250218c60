export type RequestStatus = "pending" | "served";

export interface BridgeRequest {
  requestId: bigint;
  account: string; // C2 address whose storage is read
  key: bigint; // storage slot
  blockId: bigint; // C2 block height the read is evaluated at
  submittedAt: Date;
  status: RequestStatus;
  reply: string | null; // 0x-hex, set once served
}

export interface StateProof {
  stateRoot: string;
  account: string;
  accountProof: string[];
  storageHash: string;
  storageKey: string; // always 32 bytes
  storageValue: string;
  storageProof: string[];
}

// C2 block header, reduced to the fields the proof needs
export interface BlockHeader {
  number: bigint;
  hash: string;
  stateRoot: string;
}

export interface StorageProofEntry {
  key: string;
  value: string;
  proof: string[];
}

// eth_getProof response
export interface ProofResponse {
  address: string;
  accountProof: string[];
  balance: string;
  codeHash: string;
  nonce: string;
  storageHash: string;
  storageProof: StorageProofEntry[];
}

export interface RequestLoggedEvent {
  requestId: bigint;
  account: string;
  key: bigint;
  blockId: bigint;
  blockNumber: number;
  logIndex: number;
  transactionHash: string;
}

export interface RequestServedEvent {
  requestId: bigint;
  reply: string;
  blockNumber: number;
  logIndex: number;
  transactionHash: string;
}

export interface BridgeEvents {
  RequestLogged: RequestLoggedEvent;
  RequestServed: RequestServedEvent;
}

export type BridgeEventName = keyof BridgeEvents;

export interface EventFilter {
  requestId?: bigint;
}

// Next C1 block to scan
export type EventCursor = number;

export type RelayJobStatus = "processing" | "served" | "failed";

export interface RelayJob {
  requestId: string; // decimal, PRIMARY KEY
  account: string;
  key: string;
  blockId: string;

  status: RelayJobStatus;
  reply: string | null;
  verifyTxHash: string | null;
  error: string | null;
  attempts: number;

  // Timestamps (ISO strings)
  createdAt: string;
  servedAt: string | null;
  updatedAt: string;
}
