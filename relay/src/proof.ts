import { ethers } from "ethers";
import { ProofConstructionError } from "./errors.js";
import type { BlockHeader, ProofResponse, StateProof } from "./types.js";

/**
 * Storage slot as the 32-byte word the Bridge expects, e.g. key 1 becomes
 * 31 zero bytes followed by 0x01.
 */
export function storageSlot(key: bigint): string {
  if (key < 0n || key > ethers.MaxUint256) {
    throw new ProofConstructionError(`Storage key ${key} does not fit in 32 bytes`);
  }
  return ethers.zeroPadValue(ethers.toBeHex(key), 32);
}

/**
 * Builds the payload for Bridge.verify from a C2 header and the matching
 * eth_getProof response. Clients differ in whether they echo storage keys
 * padded or as quantities, so entries are matched by numeric value.
 *
 * The storage value is re-encoded minimally, with zero as the single byte 0x00.
 */
export function assembleStateProof(
  header: BlockHeader,
  response: ProofResponse,
  key: bigint,
): StateProof {
  const storageKey = storageSlot(key);

  const entry = response.storageProof.find(
    (candidate) => ethers.toBigInt(candidate.key) === key,
  );
  if (!entry) {
    throw new ProofConstructionError(
      `No storage proof for slot ${storageKey} of ${response.address}`,
    );
  }

  return {
    stateRoot: header.stateRoot,
    account: ethers.getAddress(response.address),
    accountProof: [...response.accountProof],
    storageHash: response.storageHash,
    storageKey,
    storageValue: ethers.toBeHex(ethers.toBigInt(entry.value)),
    storageProof: [...entry.proof],
  };
}
