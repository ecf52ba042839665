import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Server } from "node:http";
import dotenv from "dotenv";
import { eventSelectorFor, loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createEthersLedgerClient } from "./ledger.js";
import { EventScanner } from "./scanner.js";
import { AttestationSink } from "./sink.js";
import { createStore } from "./store.js";
import { Orchestrator } from "./orchestrator.js";
import { createApiServer, listenApiServer } from "./api.js";

dotenv.config({ path: process.env.ENV_FILE ?? ".env" });

let config: Readonly<Config>;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

// Ensure DB directory exists
mkdirSync(dirname(config.dbPath), { recursive: true });

const store = createStore(config.dbPath);
const ledger = createEthersLedgerClient(config);
const scanner = new EventScanner(config, ledger, eventSelectorFor(config));
const sink = new AttestationSink(config, store);
const orchestrator = new Orchestrator(config, ledger, scanner, sink);

let server: Server | null = null;
let apiFailed = false;
if (config.apiPort > 0) {
  listenApiServer(createApiServer(orchestrator, store), config.apiPort).then(
    (listening) => {
      server = listening;
      console.log(`Status API listening on port ${config.apiPort}`);
    },
    (err) => {
      console.error(
        `Status API failed to listen on port ${config.apiPort}: ${errorMessage(err)}`,
      );
      apiFailed = true;
      shutdown();
    },
  );
}

// Graceful shutdown: the orchestrator finishes its batch, then run() settles
function shutdown() {
  orchestrator.stop();
  // Force exit after 10s
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

function exit(code: number): void {
  store.close();
  if (!server) {
    process.exit(code);
  }
  server.close(() => {
    console.log("HTTP server closed");
    process.exit(code);
  });
}

orchestrator.run().then(
  () => {
    console.log("Bridge watcher stopped");
    exit(apiFailed ? 1 : 0);
  },
  (err) => {
    console.error("Bridge watcher fatal error:", err);
    exit(1);
  },
);
