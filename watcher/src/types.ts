import type { DecodingError } from "./errors.js";

export interface EventRecord {
  readonly fromAddress: string; // checksummed
  readonly toAddress: string; // checksummed
  readonly token: string; // checksummed

  readonly amount: bigint;
  readonly sourceChainId: number;
  readonly destinationChainId: number;
  readonly nonce: bigint; // idempotency key downstream

  // Provenance
  readonly transactionHash: string; // 0x-prefixed lowercase
  readonly blockNumber: number;
  readonly logIndex: number;
}

/**
 * A log as handed over by the ledger client. `args` holds the decoded event
 * fields keyed by ABI name, or null when the log did not match the event ABI.
 */
export interface RawLogEntry {
  transactionHash: string;
  blockNumber: number;
  logIndex: number;
  args: Record<string, unknown> | null;
}

export interface BlockRange {
  fromHeight: number;
  toHeight: number;
}

export interface ScanBatch {
  range: BlockRange | null; // null: nothing scanned this tick
  records: EventRecord[];
  skipped: DecodingError[];
}

export type DeliveryOutcome =
  | { kind: "delivered"; status: number; attempts: number }
  | { kind: "rejected"; status: number; reason: string }
  | { kind: "retryable"; reason: string; attempts: number };

export type AttemptResult = "delivered" | "rejected" | "retryable";

export interface DeliveryAttempt {
  deliveryKey: string;
  transactionHash: string;
  logIndex: number;
  blockNumber: number;
  attempt: number;
  result: AttemptResult;
  httpStatus: number | null;
  error: string | null;
  attemptedAt: string; // ISO
}

export type OrchestratorState =
  | "starting"
  | "running"
  | "stopping"
  | "stopped"
  | "failed";

export interface TickResult {
  range: BlockRange | null;
  discovered: number;
  skipped: number;
  delivered: number;
  rejected: number;
  halted: boolean; // a retryable failure stopped the batch
  committed: boolean;
}
