import type { Config } from "./config.js";
import {
  ChainMismatchError,
  LedgerGaveUpError,
  LedgerUnavailableError,
  errorMessage,
} from "./errors.js";
import type { LedgerClient } from "./ledger.js";
import type { EventScanner } from "./scanner.js";
import type { AttestationSink } from "./sink.js";
import { sleep as defaultSleep } from "./sleep.js";
import type { Sleep } from "./sleep.js";
import type { OrchestratorState, TickResult } from "./types.js";

type OrchestratorConfig = Pick<
  Config,
  "sourceChainId" | "pollingIntervalSeconds" | "maxConsecutiveLedgerFailures"
>;

export interface OrchestratorStatus {
  state: OrchestratorState;
  cursor: number | null;
  lastTickAt: string | null;
  lastTick: TickResult | null;
  lastError: string | null;
}

/**
 * Drives scan-then-submit cycles one at a time:
 *
 *   starting -> running -> stopping -> stopped
 *   starting | running -> failed
 *
 * A record that is still retryable after the sink's own retries halts its
 * batch and keeps the cursor where it was, so the next tick re-sends the
 * whole batch. The attestation API must dedupe by nonce for that to be safe.
 */
export class Orchestrator {
  private state: OrchestratorState = "starting";
  private readonly stopController = new AbortController();
  private readonly sleep: Sleep;
  private lastTickAt: string | null = null;
  private lastTick: TickResult | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly config: Readonly<OrchestratorConfig>,
    private readonly ledger: LedgerClient,
    private readonly scanner: EventScanner,
    private readonly sink: AttestationSink,
    options: { sleep?: Sleep } = {},
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  status(): OrchestratorStatus {
    return {
      state: this.state,
      cursor: this.scanner.cursor,
      lastTickAt: this.lastTickAt,
      lastTick: this.lastTick,
      lastError: this.lastError,
    };
  }

  /**
   * Runs until stopped. Resolves once the state is `stopped`; rejects with
   * the fatal error once the state is `failed`.
   */
  async run(): Promise<void> {
    if (this.is("stopping")) {
      // stop() arrived before run()
      this.transition("stopped");
      return;
    }
    if (!this.is("starting")) {
      throw new Error(`Orchestrator cannot run from state ${this.state}`);
    }
    console.log("Bridge watcher starting");

    try {
      await this.verifyChain();
      if (this.is("starting")) {
        this.transition("running");
      }

      while (this.is("running")) {
        await this.tick();
        if (!this.is("running")) break;
        await this.sleep(
          this.config.pollingIntervalSeconds * 1000,
          this.stopController.signal,
        );
      }
    } catch (err) {
      this.lastError = errorMessage(err);
      console.error(`Bridge watcher failed: ${this.lastError}`);
      this.transition("failed");
      throw err;
    }

    this.transition("stopped");
  }

  /** Lets the in-flight batch finish, then stops. Safe to call repeatedly. */
  stop(): void {
    if (this.is("starting") || this.is("running")) {
      console.log("Shutdown requested");
      this.transition("stopping");
    }
    this.stopController.abort();
  }

  /** One scan-then-submit cycle. */
  async tick(): Promise<TickResult> {
    const batch = await this.scanner.scan();
    const result: TickResult = {
      range: batch.range,
      discovered: batch.records.length,
      skipped: batch.skipped.length,
      delivered: 0,
      rejected: 0,
      halted: false,
      committed: false,
    };

    for (const record of batch.records) {
      const outcome = await this.sink.submit(record, this.stopController.signal);

      if (outcome.kind === "delivered") {
        result.delivered += 1;
        continue;
      }
      if (outcome.kind === "rejected") {
        result.rejected += 1;
        console.error(
          `ALERT: nonce ${record.nonce} (tx ${record.transactionHash}, block ${record.blockNumber}) permanently rejected: ${outcome.reason}`,
        );
        continue;
      }

      result.halted = true;
      console.warn(
        `Batch [${batch.range?.fromHeight}, ${batch.range?.toHeight}] halted at nonce ${record.nonce} (tx ${record.transactionHash}, block ${record.blockNumber}): ${outcome.reason}; cursor stays at ${this.scanner.cursor}`,
      );
      break;
    }

    if (!result.halted && batch.range) {
      this.scanner.commit(batch);
      result.committed = true;
    }

    this.lastTick = result;
    this.lastTickAt = new Date().toISOString();
    return result;
  }

  private async verifyChain(): Promise<void> {
    const max = this.config.maxConsecutiveLedgerFailures;
    for (let failures = 1; ; failures++) {
      try {
        const chainId = await this.ledger.getChainId();
        if (chainId !== this.config.sourceChainId) {
          throw new ChainMismatchError(this.config.sourceChainId, chainId);
        }
        console.log(`Connected to source chain ${chainId}`);
        return;
      } catch (err) {
        if (!(err instanceof LedgerUnavailableError)) throw err;
        console.warn(
          `Ledger unavailable during startup (${failures}/${max}): ${err.message}`,
        );
        if (failures >= max) {
          throw new LedgerGaveUpError(failures, { cause: err });
        }
        const waited = await this.sleep(
          this.config.pollingIntervalSeconds * 1000,
          this.stopController.signal,
        );
        if (!waited) return;
      }
    }
  }

  // Method rather than a direct comparison: the state changes across awaits
  private is(state: OrchestratorState): boolean {
    return this.state === state;
  }

  private transition(next: OrchestratorState): void {
    console.log(`Orchestrator ${this.state} -> ${next}`);
    this.state = next;
  }
}
