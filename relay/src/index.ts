import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LoopHandle } from "./clock.js";
import { createClient, type BridgeClient } from "./client.js";
import { loadConfig, maskUrl } from "./config.js";
import { createServedDispatcher } from "./dispatcher.js";
import { createApiServer } from "./api.js";
import { EthersHomeGateway } from "./home-chain.js";
import { TokenBucket } from "./ratelimit.js";
import { createRelay } from "./relay.js";
import { createStatusQuery } from "./status.js";
import { createStore, type Store } from "./store.js";
import { EthersTargetGateway } from "./target-chain.js";
import { RequestLifecycleTracker } from "./tracker.js";

const config = loadConfig();
const runsRelay = config.role !== "bot";
const runsBot = config.role !== "relay";

const home = new EthersHomeGateway(config);
const status = createStatusQuery(home);
const loops: LoopHandle[] = [];
let journal: Store | undefined;

console.log(
  `Starting (${config.role})\nChain\t: ${maskUrl(config.homeRpcUrl)}\nBridge\t: ${config.bridgeAddress}\nSigner\t: ${home.wallet.address}`,
);

if (runsRelay) {
  if (!config.targetRpcUrl) {
    throw new Error("Relay role requires TARGET_RPC_URL or TARGET_API_TOKEN");
  }
  console.log(`Target\t: ${maskUrl(config.targetRpcUrl)}`);

  // Ensure DB directory exists
  if (config.dbPath !== ":memory:") {
    mkdirSync(dirname(config.dbPath), { recursive: true });
  }
  journal = createStore(config.dbPath);

  const relay = createRelay({
    config,
    home,
    target: new EthersTargetGateway(
      config.targetRpcUrl,
      new TokenBucket(config.targetRateLimit, config.targetRateLimit),
    ),
    tracker: new RequestLifecycleTracker(),
    journal,
  });
  loops.push(relay.start());
}

let client: BridgeClient | undefined;
if (runsBot) {
  // Separate from the relay's tracker, which only holds requests in flight
  const tracker = new RequestLifecycleTracker();
  loops.push(createServedDispatcher({ config, home, tracker }).start());
  client = createClient({ config, home, tracker, status });
}

// Start HTTP API
const app = createApiServer({
  role: config.role,
  status: runsBot ? status : undefined,
  client,
  journal,
});
const server = app.listen(config.apiPort, () => {
  console.log(`HTTP API listening on port ${config.apiPort}`);
});

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log("Shutting down...");
  // Force exit after 10s
  setTimeout(() => process.exit(1), 10_000).unref();

  await Promise.all(loops.map((loop) => loop.stop()));
  journal?.close();
  server.close(() => {
    console.log("HTTP server closed");
    process.exit(0);
  });
  // Drops long-polling POST /requests callers, which releases their waits
  server.closeAllConnections();
}

function onSignal(): void {
  shutdown().catch((err) => {
    console.error("Shutdown error:", err);
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
