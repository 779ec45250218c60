import { ethers } from "ethers";
import { MAX_TIMEOUT_MS } from "./tracker.js";

export type Role = "relay" | "bot" | "all";

export interface Config {
  role: Role;

  homeRpcUrl: string;
  bridgeAddress: string;
  signerPrivateKey: string;

  // Only required when the relay runs
  targetRpcUrl: string | null;

  apiPort: number;

  pollIntervalMs: number;
  waitTimeoutMs: number;
  receiptConfirmations: number;
  maxLogRange: number;

  maxRetries: number;
  retryDelayMs: number;

  targetRateLimit: number; // C2 requests per second

  dbPath: string;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function integer(
  name: string,
  fallback: number,
  min = 0,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(
      `Invalid ${name}: expected an integer between ${min} and ${max}, got "${raw}"`,
    );
  }
  return value;
}

function parseRole(raw: string | undefined): Role {
  const role = raw ?? "all";
  if (role !== "relay" && role !== "bot" && role !== "all") {
    throw new Error(`Invalid ROLE: "${role}" (expected relay, bot or all)`);
  }
  return role;
}

function targetRpcUrl(role: Role): string | null {
  const url = process.env.TARGET_RPC_URL;
  if (url) return url;
  const token = process.env.TARGET_API_TOKEN;
  if (token) return `https://mainnet.infura.io/v3/${token}`;
  if (role === "bot") return null;
  throw new Error("Missing required env var: TARGET_RPC_URL or TARGET_API_TOKEN");
}

export function loadConfig(): Config {
  const role = parseRole(process.env.ROLE);
  const bridgeAddress = required("BRIDGE_ADDRESS");
  if (!ethers.isAddress(bridgeAddress)) {
    throw new Error(`Invalid BRIDGE_ADDRESS: ${bridgeAddress}`);
  }

  return {
    role,

    homeRpcUrl: required("HOME_RPC_URL"),
    bridgeAddress: ethers.getAddress(bridgeAddress),
    signerPrivateKey: required("SIGNER_PRIVATE_KEY"),

    targetRpcUrl: targetRpcUrl(role),

    apiPort: integer("API_PORT", 3000),

    pollIntervalMs: integer("POLL_INTERVAL_MS", 2000, 1, MAX_TIMEOUT_MS),
    waitTimeoutMs: integer("WAIT_TIMEOUT_MS", 600_000, 1, MAX_TIMEOUT_MS),
    receiptConfirmations: integer("RECEIPT_CONFIRMATIONS", 1, 1),
    maxLogRange: integer("MAX_LOG_RANGE", 1000, 1),

    maxRetries: integer("MAX_RETRIES", 0),
    retryDelayMs: integer("RETRY_DELAY_MS", 2000, 0, MAX_TIMEOUT_MS),

    targetRateLimit: integer("TARGET_RATE_LIMIT", 10, 1),

    dbPath: process.env.DB_PATH ?? "./data/relay.db",
  };
}

// Hide API tokens embedded in the URL path when logging
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const segments = parsed.pathname.split("/");
    const last = segments.length - 1;
    if (segments[last] && segments[last].length > 8) {
      segments[last] = `${segments[last].slice(0, 4)}...`;
    }
    parsed.pathname = segments.join("/");
    parsed.password = "";
    return parsed.toString();
  } catch {
    return "<invalid url>";
  }
}
