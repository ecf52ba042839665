import Database from "better-sqlite3";
import { deliveryKey } from "./record.js";
import type { AttemptResult, DeliveryAttempt, EventRecord } from "./types.js";

/**
 * Audit trail of attestation attempts. Holds no cursor state: the scan
 * cursor lives in memory only.
 */
export interface DeliveryStore {
  recordAttempt(attempt: DeliveryAttempt): void;
  /**
   * True unless the key was already delivered. Supersedes an earlier
   * rejection of the key.
   */
  markDelivered(record: EventRecord): boolean;
  /** True only when the key had no resolution yet. */
  markRejected(record: EventRecord, reason: string): boolean;
  getAttempts(deliveryKey: string): DeliveryAttempt[];
  countByOutcome(): Record<string, number>;
  close(): void;
}

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS delivery_attempts (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  delivery_key      TEXT NOT NULL,
  tx_hash           TEXT NOT NULL,
  log_index         INTEGER NOT NULL,
  block_number      INTEGER NOT NULL,
  attempt           INTEGER NOT NULL,
  result            TEXT NOT NULL,
  http_status       INTEGER,
  error             TEXT,
  attempted_at      TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_attempts_key ON delivery_attempts(delivery_key);

CREATE TABLE IF NOT EXISTS deliveries (
  delivery_key      TEXT PRIMARY KEY,
  tx_hash           TEXT NOT NULL,
  log_index         INTEGER NOT NULL,
  block_number      INTEGER NOT NULL,
  outcome           TEXT NOT NULL,
  reason            TEXT,
  resolved_at       TEXT NOT NULL
);
`;

interface AttemptRow {
  delivery_key: string;
  tx_hash: string;
  log_index: number;
  block_number: number;
  attempt: number;
  result: AttemptResult;
  http_status: number | null;
  error: string | null;
  attempted_at: string;
}

function rowToAttempt(row: AttemptRow): DeliveryAttempt {
  return {
    deliveryKey: row.delivery_key,
    transactionHash: row.tx_hash,
    logIndex: row.log_index,
    blockNumber: row.block_number,
    attempt: row.attempt,
    result: row.result,
    httpStatus: row.http_status,
    error: row.error,
    attemptedAt: row.attempted_at,
  };
}

export function createStore(dbPath: string): DeliveryStore {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(CREATE_TABLES);

  const insertAttemptStmt = db.prepare(`
    INSERT INTO delivery_attempts (
      delivery_key, tx_hash, log_index, block_number,
      attempt, result, http_status, error, attempted_at
    ) VALUES (
      @deliveryKey, @transactionHash, @logIndex, @blockNumber,
      @attempt, @result, @httpStatus, @error, @attemptedAt
    )
  `);

  // First resolution wins, except that a delivery of a re-sent batch
  // replaces an earlier rejection of the same key
  const resolveStmt = db.prepare(`
    INSERT INTO deliveries (
      delivery_key, tx_hash, log_index, block_number, outcome, reason, resolved_at
    ) VALUES (
      @deliveryKey, @transactionHash, @logIndex, @blockNumber, @outcome, @reason, @resolvedAt
    )
    ON CONFLICT(delivery_key) DO UPDATE SET
      outcome = excluded.outcome,
      reason = excluded.reason,
      resolved_at = excluded.resolved_at
    WHERE deliveries.outcome = 'rejected' AND excluded.outcome = 'delivered'
  `);

  const attemptsStmt = db.prepare<[string], AttemptRow>(
    "SELECT * FROM delivery_attempts WHERE delivery_key = ? ORDER BY id ASC",
  );

  const countStmt = db.prepare<[], { outcome: string; cnt: number }>(
    "SELECT outcome, COUNT(*) as cnt FROM deliveries GROUP BY outcome",
  );

  function resolve(
    record: EventRecord,
    outcome: "delivered" | "rejected",
    reason: string | null,
  ): boolean {
    const info = resolveStmt.run({
      deliveryKey: deliveryKey(record),
      transactionHash: record.transactionHash,
      logIndex: record.logIndex,
      blockNumber: record.blockNumber,
      outcome,
      reason,
      resolvedAt: new Date().toISOString(),
    });
    return info.changes === 1;
  }

  return {
    recordAttempt(attempt: DeliveryAttempt): void {
      insertAttemptStmt.run({ ...attempt });
    },

    markDelivered(record: EventRecord): boolean {
      return resolve(record, "delivered", null);
    },

    markRejected(record: EventRecord, reason: string): boolean {
      return resolve(record, "rejected", reason);
    },

    getAttempts(key: string): DeliveryAttempt[] {
      return attemptsStmt.all(key).map(rowToAttempt);
    },

    countByOutcome(): Record<string, number> {
      const result: Record<string, number> = {};
      for (const row of countStmt.all()) {
        result[row.outcome] = row.cnt;
      }
      return result;
    },

    close(): void {
      db.close();
    },
  };
}
