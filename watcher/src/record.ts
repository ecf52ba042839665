import { ethers } from "ethers";
import { DecodingError } from "./errors.js";
import type { EventRecord, RawLogEntry } from "./types.js";

const TX_HASH_REGEX = /^0x[a-fA-F0-9]{64}$/;

function fail(raw: RawLogEntry, reason: string): never {
  throw new DecodingError(
    `log ${raw.transactionHash}:${raw.logIndex}: ${reason}`,
    typeof raw.transactionHash === "string" ? raw.transactionHash : null,
    Number.isSafeInteger(raw.logIndex) ? raw.logIndex : null,
  );
}

function field(
  raw: RawLogEntry,
  args: Record<string, unknown>,
  name: string,
): unknown {
  const value = args[name];
  if (value === undefined || value === null) {
    fail(raw, `missing field ${name}`);
  }
  return value;
}

function toAddress(raw: RawLogEntry, name: string, value: unknown): string {
  if (typeof value !== "string" || !ethers.isAddress(value)) {
    fail(raw, `field ${name} is not an address`);
  }
  return ethers.getAddress(value);
}

// uint256 values arrive as bigint from ethers; decimal strings and safe
// integers are accepted too, nothing that could have lost precision.
function toUint(raw: RawLogEntry, name: string, value: unknown): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) fail(raw, `field ${name} is negative`);
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      fail(raw, `field ${name} is not a non-negative safe integer`);
    }
    return BigInt(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  fail(raw, `field ${name} is not an unsigned integer`);
}

function toChainId(raw: RawLogEntry, name: string, value: unknown): number {
  const id = toUint(raw, name, value);
  if (id > BigInt(Number.MAX_SAFE_INTEGER)) {
    fail(raw, `field ${name} exceeds the supported chain id range`);
  }
  return Number(id);
}

/**
 * Turns a raw log into an immutable EventRecord. Throws DecodingError when
 * any required field is missing or malformed; a partial record is never
 * returned.
 */
export function decodeEventRecord(
  raw: RawLogEntry,
  sourceChainId: number,
): EventRecord {
  if (
    typeof raw.transactionHash !== "string" ||
    !TX_HASH_REGEX.test(raw.transactionHash)
  ) {
    fail(raw, "malformed transaction hash");
  }
  if (!Number.isSafeInteger(raw.blockNumber) || raw.blockNumber < 0) {
    fail(raw, "malformed block number");
  }
  if (!Number.isSafeInteger(raw.logIndex) || raw.logIndex < 0) {
    fail(raw, "malformed log index");
  }
  if (raw.args === null) {
    fail(raw, "log does not match the event ABI");
  }
  const args = raw.args;

  return Object.freeze({
    fromAddress: toAddress(raw, "sender", field(raw, args, "sender")),
    toAddress: toAddress(raw, "recipient", field(raw, args, "recipient")),
    token: toAddress(raw, "token", field(raw, args, "token")),
    amount: toUint(raw, "amount", field(raw, args, "amount")),
    sourceChainId,
    destinationChainId: toChainId(
      raw,
      "destinationChainId",
      field(raw, args, "destinationChainId"),
    ),
    nonce: toUint(raw, "nonce", field(raw, args, "nonce")),
    transactionHash: raw.transactionHash.toLowerCase(),
    blockNumber: raw.blockNumber,
    logIndex: raw.logIndex,
  });
}

export function compareRecords(a: EventRecord, b: EventRecord): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}

// Discovery-layer dedup key
export function recordKey(record: Pick<EventRecord, "transactionHash" | "logIndex">): string {
  return `${record.transactionHash.toLowerCase()}:${record.logIndex}`;
}

// Attestation-layer idempotency key
export function deliveryKey(
  record: Pick<EventRecord, "sourceChainId" | "nonce">,
): string {
  return `${record.sourceChainId}:${record.nonce}`;
}
