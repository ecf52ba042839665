import type { EventSelector } from "./abis.js";
import type { Config } from "./config.js";
import {
  DecodingError,
  LedgerGaveUpError,
  LedgerUnavailableError,
} from "./errors.js";
import type { LedgerClient } from "./ledger.js";
import { compareRecords, decodeEventRecord, recordKey } from "./record.js";
import type { EventRecord, ScanBatch } from "./types.js";

type ScannerConfig = Pick<
  Config,
  | "sourceChainId"
  | "confirmationDelay"
  | "maxScanRange"
  | "startBlock"
  | "initialLookbackBlocks"
  | "maxConsecutiveLedgerFailures"
>;

function emptyBatch(): ScanBatch {
  return { range: null, records: [], skipped: [] };
}

/**
 * Owns the scan cursor. `scan()` reads the next confirmed block range and
 * returns its records without moving the cursor; the caller moves it with
 * `commit()` once every record in the batch has been resolved, so an
 * unresolved batch is reproduced by the next scan.
 *
 * Reorganisations deeper than `confirmationDelay` are not detected.
 */
export class EventScanner {
  private lastProcessedHeight: number | null;
  private consecutiveFailures = 0;

  constructor(
    private readonly config: Readonly<ScannerConfig>,
    private readonly ledger: LedgerClient,
    private readonly selector: EventSelector,
  ) {
    // -1: nothing processed yet, the next scan starts at genesis
    this.lastProcessedHeight =
      config.startBlock === null ? null : config.startBlock - 1;
  }

  get cursor(): number | null {
    return this.lastProcessedHeight;
  }

  async scan(): Promise<ScanBatch> {
    let batch: ScanBatch;
    try {
      batch = await this.scanNextRange();
    } catch (err) {
      if (!(err instanceof LedgerUnavailableError)) {
        throw err;
      }
      this.consecutiveFailures += 1;
      console.warn(
        `Ledger unavailable (${this.consecutiveFailures}/${this.config.maxConsecutiveLedgerFailures}): ${err.message}`,
      );
      if (this.consecutiveFailures >= this.config.maxConsecutiveLedgerFailures) {
        throw new LedgerGaveUpError(this.consecutiveFailures, { cause: err });
      }
      return emptyBatch();
    }

    this.consecutiveFailures = 0;
    return batch;
  }

  /** Advances the cursor to the end of a resolved batch. Never moves it back. */
  commit(batch: ScanBatch): void {
    if (!batch.range) return;
    const { toHeight } = batch.range;
    if (this.lastProcessedHeight !== null && toHeight <= this.lastProcessedHeight) {
      return;
    }
    this.lastProcessedHeight = toHeight;
    console.log(`Cursor advanced to block ${toHeight}`);
  }

  private async scanNextRange(): Promise<ScanBatch> {
    const currentHeight = await this.ledger.getLatestHeight();
    const safeHeight = currentHeight - this.config.confirmationDelay;

    if (this.lastProcessedHeight === null) {
      this.lastProcessedHeight = Math.max(
        -1,
        safeHeight - this.config.initialLookbackBlocks,
      );
      console.log(
        `Cursor initialised at block ${this.lastProcessedHeight} (head ${currentHeight})`,
      );
    }

    const fromHeight = this.lastProcessedHeight + 1;
    if (safeHeight < fromHeight) {
      return emptyBatch();
    }
    const toHeight = Math.min(
      safeHeight,
      this.lastProcessedHeight + this.config.maxScanRange,
    );

    console.log(
      `Scanning blocks [${fromHeight}, ${toHeight}] (head ${currentHeight}, safe ${safeHeight})`,
    );

    const logs = await this.ledger.getEvents(fromHeight, toHeight, this.selector);

    const byKey = new Map<string, EventRecord>();
    const skipped: DecodingError[] = [];

    for (const log of logs) {
      try {
        if (log.blockNumber < fromHeight || log.blockNumber > toHeight) {
          throw new DecodingError(
            `log ${log.transactionHash}:${log.logIndex} at block ${log.blockNumber} is outside [${fromHeight}, ${toHeight}]`,
            log.transactionHash,
            log.logIndex,
          );
        }
        const record = decodeEventRecord(log, this.config.sourceChainId);
        const key = recordKey(record);
        if (byKey.has(key)) {
          console.warn(`Duplicate log ${key} in [${fromHeight}, ${toHeight}], ignored`);
          continue;
        }
        byKey.set(key, record);
      } catch (err) {
        if (!(err instanceof DecodingError)) throw err;
        console.error(`Skipping undecodable log: ${err.message}`);
        skipped.push(err);
      }
    }

    const records = [...byKey.values()].sort(compareRecords);

    if (records.length > 0 || skipped.length > 0) {
      console.log(
        `Found ${records.length} event(s), ${skipped.length} skipped, in [${fromHeight}, ${toHeight}]`,
      );
    }

    return { range: { fromHeight, toHeight }, records, skipped };
  }
}
