import { expect } from "chai";
import express from "express";
import { ethers } from "ethers";
import type { Server } from "node:http";
import {
  LedgerFatalError,
  LedgerUnavailableError,
} from "../watcher/src/errors.js";
import {
  classifyLedgerError,
  createEthersLedgerClient,
  parseArgs,
} from "../watcher/src/ledger.js";
import { rejectionOf } from "./helpers/assert.js";
import {
  BRIDGE_ADDRESS,
  RECIPIENT,
  SENDER,
  SOURCE_CHAIN_ID,
  TOKEN,
  selector,
  testConfig,
  txHash,
} from "./helpers/fixtures.js";

// ── Helpers ──────────────────────────────────────────────────────

function codedError(code: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(`${code.toLowerCase()} from provider`), { code, ...extra });
}

function encodedLog(nonce: bigint) {
  return selector.iface.encodeEventLog(selector.fragment, [
    SENDER,
    RECIPIENT,
    84532n,
    TOKEN,
    5_000n,
    nonce,
  ]);
}

interface JsonRpcRequest {
  id: number;
  method: string;
  params: unknown[];
}

function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  return typeof value === "object" && value !== null && "method" in value && "id" in value;
}

// ── Tests ────────────────────────────────────────────────────────

describe("classifyLedgerError", function () {
  it("should treat timeouts and network errors as transient", function () {
    expect(classifyLedgerError(codedError("TIMEOUT"), "eth_blockNumber")).to.be.instanceOf(
      LedgerUnavailableError,
    );
    expect(classifyLedgerError(codedError("NETWORK_ERROR"), "eth_blockNumber")).to.be.instanceOf(
      LedgerUnavailableError,
    );
    expect(classifyLedgerError(new Error("socket hang up"), "eth_getLogs").message).to.equal(
      "eth_getLogs failed: socket hang up",
    );
  });

  it("should treat 5xx and 429 server errors as transient", function () {
    for (const statusCode of [429, 500, 502]) {
      const err = codedError("SERVER_ERROR", { response: { statusCode } });
      expect(classifyLedgerError(err, "eth_getLogs")).to.be.instanceOf(LedgerUnavailableError);
    }
  });

  it("should treat authentication failures as fatal", function () {
    for (const statusCode of [401, 403]) {
      const err = codedError("SERVER_ERROR", { response: { statusCode } });
      const classified = classifyLedgerError(err, "eth_blockNumber");
      expect(classified).to.be.instanceOf(LedgerFatalError);
      expect(classified.message).to.equal(`eth_blockNumber rejected with HTTP ${statusCode}`);
      expect(classified.cause).to.equal(err);
    }
  });

  it("should treat invalid arguments and unsupported operations as fatal", function () {
    expect(classifyLedgerError(codedError("INVALID_ARGUMENT"), "eth_getLogs")).to.be.instanceOf(
      LedgerFatalError,
    );
    expect(
      classifyLedgerError(codedError("UNSUPPORTED_OPERATION"), "eth_getLogs"),
    ).to.be.instanceOf(LedgerFatalError);
  });

  it("should pass already-classified errors through", function () {
    const err = new LedgerFatalError("bad endpoint");
    expect(classifyLedgerError(err, "eth_chainId")).to.equal(err);
  });
});

describe("parseArgs", function () {
  it("should decode indexed and unindexed fields by name", function () {
    expect(parseArgs(selector, encodedLog(9n))).to.deep.equal({
      sender: SENDER,
      recipient: RECIPIENT,
      destinationChainId: 84532n,
      token: TOKEN,
      amount: 5_000n,
      nonce: 9n,
    });
  });

  it("should return null for a log of another event", function () {
    const log = { topics: [ethers.id("Other(uint256)")], data: "0x" };
    expect(parseArgs(selector, log)).to.equal(null);
  });

  it("should return null for truncated data", function () {
    const log = { ...encodedLog(9n), data: "0x1234" };
    expect(parseArgs(selector, log)).to.equal(null);
  });
});

describe("createEthersLedgerClient", function () {
  let server: Server;
  let rpcUrl: string;
  let rejectWith: number | null = null;
  let logData: string | null = null;
  const getLogsParams: unknown[] = [];

  function answer(request: JsonRpcRequest): unknown {
    switch (request.method) {
      case "eth_chainId":
        return ethers.toQuantity(SOURCE_CHAIN_ID);
      case "eth_blockNumber":
        return ethers.toQuantity(112);
      case "eth_getLogs": {
        getLogsParams.push(request.params[0]);
        const log = encodedLog(3n);
        return [
          {
            address: BRIDGE_ADDRESS,
            blockHash: "0x" + "99".repeat(32),
            blockNumber: ethers.toQuantity(104),
            data: logData ?? log.data,
            logIndex: ethers.toQuantity(2),
            removed: false,
            topics: log.topics,
            transactionHash: txHash(42),
            transactionIndex: "0x0",
          },
        ];
      }
      default:
        return null;
    }
  }

  before(async function () {
    const app = express();
    app.use(express.json());
    app.post("/", (req, res) => {
      if (rejectWith !== null) {
        res.status(rejectWith).send("nope");
        return;
      }
      const body: unknown = req.body;
      const respond = (request: unknown) =>
        isJsonRpcRequest(request)
          ? { jsonrpc: "2.0", id: request.id, result: answer(request) }
          : { jsonrpc: "2.0", id: null, error: { code: -32600, message: "invalid request" } };
      res.json(Array.isArray(body) ? body.map(respond) : respond(body));
    });
    await new Promise<void>((resolve) => {
      server = app.listen(0, "127.0.0.1", () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`unexpected server address ${address}`);
    }
    rpcUrl = `http://127.0.0.1:${address.port}/`;
  });

  afterEach(function () {
    rejectWith = null;
    logData = null;
  });

  after(async function () {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
  });

  it("should read the chain id and head height", async function () {
    const ledger = createEthersLedgerClient(testConfig({ sourceChainRpcUrl: rpcUrl }));

    expect(await ledger.getChainId()).to.equal(SOURCE_CHAIN_ID);
    expect(await ledger.getLatestHeight()).to.equal(112);
  });

  it("should query logs by contract and topic and decode them", async function () {
    const ledger = createEthersLedgerClient(testConfig({ sourceChainRpcUrl: rpcUrl }));

    const logs = await ledger.getEvents(101, 106, selector);

    expect(getLogsParams.at(-1)).to.deep.include({
      address: BRIDGE_ADDRESS.toLowerCase(),
      topics: [selector.topic0],
      fromBlock: ethers.toQuantity(101),
      toBlock: ethers.toQuantity(106),
    });
    expect(logs).to.deep.equal([
      {
        transactionHash: txHash(42),
        blockNumber: 104,
        logIndex: 2,
        args: {
          sender: SENDER,
          recipient: RECIPIENT,
          destinationChainId: 84532n,
          token: TOKEN,
          amount: 5_000n,
          nonce: 3n,
        },
      },
    ]);
  });

  it("should fail fatally when a log of the configured event does not decode", async function () {
    logData = "0x1234";
    const ledger = createEthersLedgerClient(testConfig({ sourceChainRpcUrl: rpcUrl }));

    const err = await rejectionOf(ledger.getEvents(101, 106, selector));

    expect(err).to.be.instanceOf(LedgerFatalError);
    expect(err).to.have.property(
      "message",
      `log ${txHash(42)}:2 from ${BRIDGE_ADDRESS} does not decode as BridgeTransferInitiated(address,address,uint256,address,uint256,uint256)`,
    );
  });

  it("should fail fatally when the endpoint rejects the credentials", async function () {
    rejectWith = 401;
    const ledger = createEthersLedgerClient(testConfig({ sourceChainRpcUrl: rpcUrl }));

    const err = await rejectionOf(ledger.getLatestHeight());

    expect(err).to.be.instanceOf(LedgerFatalError);
  });
});
