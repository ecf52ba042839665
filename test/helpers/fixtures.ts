import { ethers } from "ethers";
import { createEventSelector, BRIDGE_TRANSFER_INITIATED } from "../../watcher/src/abis.js";
import type { Config } from "../../watcher/src/config.js";
import type { RawLogEntry } from "../../watcher/src/types.js";

export const BRIDGE_ADDRESS = ethers.getAddress("0x" + "b1".repeat(20));
export const SENDER = ethers.getAddress("0x" + "a1".repeat(20));
export const RECIPIENT = ethers.getAddress("0x" + "c2".repeat(20));
export const TOKEN = ethers.getAddress("0x" + "d3".repeat(20));

export const SOURCE_CHAIN_ID = 11155111;
export const DESTINATION_CHAIN_ID = 84532;

export const selector = createEventSelector(BRIDGE_ADDRESS, BRIDGE_TRANSFER_INITIATED);

export function txHash(n: number): string {
  return "0x" + n.toString(16).padStart(64, "0");
}

export function rawLog(opts: {
  blockNumber: number;
  logIndex?: number;
  nonce: bigint;
  amount?: bigint;
  tx?: number;
}): RawLogEntry {
  return {
    transactionHash: txHash(opts.tx ?? opts.blockNumber * 100 + (opts.logIndex ?? 0)),
    blockNumber: opts.blockNumber,
    logIndex: opts.logIndex ?? 0,
    args: {
      sender: SENDER,
      recipient: RECIPIENT,
      destinationChainId: BigInt(DESTINATION_CHAIN_ID),
      token: TOKEN,
      amount: opts.amount ?? 1_000_000n,
      nonce: opts.nonce,
    },
  };
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    sourceChainRpcUrl: "http://localhost:8545",
    sourceChainId: SOURCE_CHAIN_ID,
    bridgeContractAddress: BRIDGE_ADDRESS,
    bridgeEventSignature: BRIDGE_TRANSFER_INITIATED,
    attestationApiUrl: "http://attest.test/attest",
    attestationApiKey: "test-secret",
    pollingIntervalSeconds: 15,
    confirmationDelay: 6,
    maxScanRange: 2000,
    startBlock: null,
    initialLookbackBlocks: 10,
    rpcTimeoutMs: 10_000,
    maxConsecutiveLedgerFailures: 3,
    attestationTimeoutMs: 10_000,
    attestationMaxAttempts: 5,
    attestationRetryBaseMs: 1000,
    attestationRetryFactor: 2,
    apiPort: 0,
    dbPath: ":memory:",
    ...overrides,
  };
}
