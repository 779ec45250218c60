import { ethers } from "ethers";

const STATE_PROOF_TUPLE =
  "tuple(bytes32 stateRoot, address account, bytes[] accountProof, bytes32 storageHash, bytes32 storageKey, bytes storageValue, bytes[] storageProof)";

export const BRIDGE_ABI = [
  "function getTotal() view returns (uint256)",
  "function getPending() view returns (uint256)",
  "function getServed() view returns (uint256)",
  "function getRequest(uint256 requestId) view returns (address account, uint256 key, uint256 blockId, uint256 timestamp, uint256 reserved1, uint256 reserved2, bool served, bytes reply)",
  "function request(address account, uint256 key, uint256 blockId, uint256 reserved1, uint256 reserved2) returns (uint256)",
  `function verify(uint256 requestId, ${STATE_PROOF_TUPLE} proof)`,
  "event RequestLogged(uint256 indexed requestId, address account, uint256 key, uint256 blockId)",
  "event RequestServed(uint256 indexed requestId, bytes reply)",
];

export const bridgeInterface = new ethers.Interface(BRIDGE_ABI);

export const REQUEST_LOGGED_TOPIC0 = ethers.id(
  "RequestLogged(uint256,address,uint256,uint256)",
);

export const REQUEST_SERVED_TOPIC0 = ethers.id("RequestServed(uint256,bytes)");
