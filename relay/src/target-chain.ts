import { ethers } from "ethers";
import { z } from "zod";
import { ProofConstructionError, TransportError } from "./errors.js";
import type { TargetChainGateway } from "./gateway.js";
import type { TokenBucket } from "./ratelimit.js";
import type { BlockHeader, ProofResponse } from "./types.js";
import { toGatewayError } from "./home-chain.js";

const hex = z.string().regex(/^0x[0-9a-fA-F]*$/, "expected 0x-prefixed hex");
const bytes32 = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "expected 32-byte hex");
const address = z.string().refine((v) => ethers.isAddress(v), "expected address");

const blockSchema = z.object({
  number: hex,
  hash: bytes32,
  stateRoot: bytes32,
});

const proofSchema = z.object({
  address,
  accountProof: z.array(hex),
  balance: hex,
  codeHash: bytes32,
  nonce: hex,
  storageHash: bytes32,
  storageProof: z.array(
    z.object({
      key: hex,
      value: hex,
      proof: z.array(hex),
    }),
  ),
});

export function parseBlockHeader(raw: unknown, blockId: bigint): BlockHeader {
  if (raw === null) {
    throw new ProofConstructionError(`Block ${blockId} not found on C2`);
  }
  const parsed = blockSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TransportError(
      `Malformed block ${blockId}: ${parsed.error.message}`,
    );
  }
  return {
    number: ethers.getBigInt(parsed.data.number),
    hash: parsed.data.hash,
    stateRoot: parsed.data.stateRoot,
  };
}

export function parseProofResponse(raw: unknown): ProofResponse {
  const parsed = proofSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TransportError(
      `Malformed eth_getProof response: ${parsed.error.message}`,
    );
  }
  return parsed.data;
}

/** Read-only access to C2 headers and Merkle proofs over JSON-RPC. */
export class EthersTargetGateway implements TargetChainGateway {
  private readonly provider: ethers.JsonRpcProvider;

  constructor(
    rpcUrl: string,
    private readonly limiter: TokenBucket,
  ) {
    this.provider = new ethers.JsonRpcProvider(rpcUrl);
  }

  async getBlock(blockId: bigint): Promise<BlockHeader> {
    const raw = await this.send("eth_getBlockByNumber", [
      ethers.toQuantity(blockId),
      false,
    ]);
    return parseBlockHeader(raw, blockId);
  }

  async getProof(
    account: string,
    keys: readonly bigint[],
    blockId: bigint,
  ): Promise<ProofResponse> {
    const raw = await this.send("eth_getProof", [
      account,
      keys.map((key) => ethers.zeroPadValue(ethers.toBeHex(key), 32)),
      ethers.toQuantity(blockId),
    ]);
    return parseProofResponse(raw);
  }

  private async send(method: string, params: unknown[]): Promise<unknown> {
    await this.limiter.acquire();
    try {
      const result: unknown = await this.provider.send(method, params);
      return result;
    } catch (err) {
      throw toGatewayError(method, err);
    }
  }
}
