import { ethers } from "ethers";
import { BRIDGE_TRANSFER_INITIATED, createEventSelector } from "./abis.js";
import type { EventSelector } from "./abis.js";
import { ConfigurationError, errorMessage } from "./errors.js";

export interface Config {
  sourceChainRpcUrl: string;
  sourceChainId: number;
  bridgeContractAddress: string;
  bridgeEventSignature: string;

  attestationApiUrl: string;
  attestationApiKey: string;

  pollingIntervalSeconds: number;
  confirmationDelay: number;
  maxScanRange: number;
  startBlock: number | null;
  initialLookbackBlocks: number;

  rpcTimeoutMs: number;
  maxConsecutiveLedgerFailures: number;

  attestationTimeoutMs: number;
  attestationMaxAttempts: number;
  attestationRetryBaseMs: number;
  attestationRetryFactor: number;

  apiPort: number; // 0 disables the status API

  dbPath: string;
}

type Env = Record<string, string | undefined>;

// Longest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMER_MS = 2 ** 31 - 1;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(name, "missing required env var");
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function integer(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max?: number,
): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  return parseInteger(name, raw, min, max);
}

function parseInteger(
  name: string,
  raw: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  // parseInt would accept "15s"
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(name, `expected an integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigurationError(name, `expected an integer >= ${min}, got "${raw}"`);
  }
  if (value > max) {
    throw new ConfigurationError(name, `expected an integer <= ${max}, got "${raw}"`);
  }
  return value;
}

function httpUrl(env: Env, name: string): string {
  const raw = required(env, name);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(name, `malformed URL "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(name, `expected an http(s) URL, got "${raw}"`);
  }
  return raw;
}

function address(env: Env, name: string): string {
  const raw = required(env, name);
  if (!ethers.isAddress(raw)) {
    throw new ConfigurationError(name, `malformed address "${raw}"`);
  }
  return ethers.getAddress(raw);
}

function positiveNumber(
  env: Env,
  name: string,
  fallback: number,
  max: number,
): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(name, `expected a positive number, got "${raw}"`);
  }
  if (value > max) {
    throw new ConfigurationError(name, `expected a number <= ${max}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Readonly<Config> {
  const bridgeContractAddress = address(env, "BRIDGE_CONTRACT_ADDRESS");
  const bridgeEventSignature =
    optional(env, "BRIDGE_EVENT_SIGNATURE") ?? BRIDGE_TRANSFER_INITIATED;

  // Fail at startup rather than on the first scan
  try {
    createEventSelector(bridgeContractAddress, bridgeEventSignature);
  } catch (err) {
    throw new ConfigurationError("BRIDGE_EVENT_SIGNATURE", errorMessage(err));
  }

  const startBlockRaw = optional(env, "START_BLOCK");

  const config: Config = {
    sourceChainRpcUrl: httpUrl(env, "SOURCE_CHAIN_RPC_URL"),
    sourceChainId: parseInteger(
      "SOURCE_CHAIN_ID",
      required(env, "SOURCE_CHAIN_ID"),
      1,
    ),
    bridgeContractAddress,
    bridgeEventSignature,

    attestationApiUrl: httpUrl(env, "ATTESTATION_API_URL"),
    attestationApiKey: required(env, "ATTESTATION_API_KEY"),

    pollingIntervalSeconds: positiveNumber(
      env,
      "POLLING_INTERVAL_SECONDS",
      15,
      MAX_TIMER_MS / 1000,
    ),
    confirmationDelay: integer(env, "BLOCK_CONFIRMATION_DELAY", 6, 0),
    maxScanRange: integer(env, "MAX_SCAN_RANGE", 2000, 1),
    startBlock:
      startBlockRaw === undefined
        ? null
        : parseInteger("START_BLOCK", startBlockRaw, 0),
    initialLookbackBlocks: integer(env, "INITIAL_LOOKBACK_BLOCKS", 10, 0),

    rpcTimeoutMs: integer(env, "RPC_TIMEOUT_MS", 10_000, 1, MAX_TIMER_MS),
    maxConsecutiveLedgerFailures: integer(
      env,
      "MAX_CONSECUTIVE_LEDGER_FAILURES",
      20,
      1,
    ),

    attestationTimeoutMs: integer(
      env,
      "ATTESTATION_TIMEOUT_MS",
      10_000,
      1,
      MAX_TIMER_MS,
    ),
    attestationMaxAttempts: integer(env, "ATTESTATION_MAX_ATTEMPTS", 5, 1),
    attestationRetryBaseMs: integer(
      env,
      "ATTESTATION_RETRY_BASE_MS",
      1000,
      0,
      MAX_TIMER_MS,
    ),
    attestationRetryFactor: positiveNumber(
      env,
      "ATTESTATION_RETRY_FACTOR",
      2,
      MAX_TIMER_MS,
    ),

    apiPort: integer(env, "API_PORT", 3000, 0, 65_535),

    dbPath: optional(env, "DB_PATH") ?? "./data/watcher.db",
  };

  // The longest backoff is the wait before the last attempt
  if (config.attestationMaxAttempts > 1) {
    const longest =
      config.attestationRetryBaseMs *
      config.attestationRetryFactor ** (config.attestationMaxAttempts - 2);
    if (longest > MAX_TIMER_MS) {
      throw new ConfigurationError(
        "ATTESTATION_RETRY_FACTOR",
        `backoff grows to ${longest}ms by attempt ${config.attestationMaxAttempts}, above ${MAX_TIMER_MS}ms`,
      );
    }
  }

  return Object.freeze(config);
}

export function eventSelectorFor(config: Readonly<Config>): EventSelector {
  return createEventSelector(
    config.bridgeContractAddress,
    config.bridgeEventSignature,
  );
}
