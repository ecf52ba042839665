import type { Config } from "./config.js";
import { errorMessage } from "./errors.js";
import { deliveryKey } from "./record.js";
import { sleep as defaultSleep } from "./sleep.js";
import type { Sleep } from "./sleep.js";
import type { DeliveryStore } from "./store.js";
import type { AttemptResult, DeliveryOutcome, EventRecord } from "./types.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

type SinkConfig = Pick<
  Config,
  | "attestationApiUrl"
  | "attestationApiKey"
  | "attestationTimeoutMs"
  | "attestationMaxAttempts"
  | "attestationRetryBaseMs"
  | "attestationRetryFactor"
>;

export interface AttestationPayload {
  from: string;
  to: string;
  token: string;
  amount: string; // decimal, uint256
  sourceChainId: number;
  destinationChainId: number;
  nonce: string; // decimal, uint256
  transactionHash: string;
  blockNumber: number;
  logIndex: number;
}

export function buildPayload(record: EventRecord): AttestationPayload {
  return {
    from: record.fromAddress,
    to: record.toAddress,
    token: record.token,
    amount: record.amount.toString(),
    sourceChainId: record.sourceChainId,
    destinationChainId: record.destinationChainId,
    nonce: record.nonce.toString(),
    transactionHash: record.transactionHash,
    blockNumber: record.blockNumber,
    logIndex: record.logIndex,
  };
}

/**
 * 408 and 429 are transient even though they are 4xx. Other 4xx mean the
 * payload or credentials are wrong and resending cannot help. Anything
 * else that is not 2xx (5xx, an unfollowed redirect) is retried.
 */
export function classifyStatus(status: number): AttemptResult {
  if (status >= 200 && status < 300) return "delivered";
  if (status === 408 || status === 429) return "retryable";
  if (status >= 400 && status < 500) return "rejected";
  return "retryable";
}

/** Delay before the attempt following attempt number `attempt` (1-based). */
export function backoffDelay(config: SinkConfig, attempt: number): number {
  return (
    config.attestationRetryBaseMs *
    config.attestationRetryFactor ** (attempt - 1)
  );
}

interface AttemptReport {
  result: AttemptResult;
  status: number | null;
  reason: string;
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 200);
  } catch (err) {
    return `(unreadable body: ${errorMessage(err)})`;
  }
}

export interface SinkOptions {
  fetch?: FetchFn;
  sleep?: Sleep;
}

export class AttestationSink {
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: Readonly<SinkConfig>,
    private readonly store: DeliveryStore,
    options: SinkOptions = {},
  ) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delivers one record, retrying transient failures with exponential
   * backoff. `signal` cuts a backoff wait short; it never aborts a request
   * already in flight.
   */
  async submit(record: EventRecord, signal?: AbortSignal): Promise<DeliveryOutcome> {
    const key = deliveryKey(record);
    const body = JSON.stringify(buildPayload(record));
    const maxAttempts = this.config.attestationMaxAttempts;
    let lastReason = "no attempt made";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const report = await this.post(body, key);

      this.store.recordAttempt({
        deliveryKey: key,
        transactionHash: record.transactionHash,
        logIndex: record.logIndex,
        blockNumber: record.blockNumber,
        attempt,
        result: report.result,
        httpStatus: report.status,
        error: report.result === "delivered" ? null : report.reason,
        attemptedAt: new Date().toISOString(),
      });

      if (report.result === "delivered") {
        const newlyDelivered = this.store.markDelivered(record);
        console.log(
          `Attestation delivered for nonce ${record.nonce} (tx ${record.transactionHash}, attempt ${attempt})` +
            (newlyDelivered ? "" : ", already delivered before"),
        );
        return { kind: "delivered", status: report.status ?? 0, attempts: attempt };
      }

      if (report.result === "rejected") {
        this.store.markRejected(record, report.reason);
        console.error(
          `Attestation rejected for nonce ${record.nonce} (tx ${record.transactionHash}): ${report.reason}`,
        );
        return { kind: "rejected", status: report.status ?? 0, reason: report.reason };
      }

      lastReason = report.reason;
      if (attempt === maxAttempts) break;

      const delay = backoffDelay(this.config, attempt);
      console.warn(
        `Attestation attempt ${attempt}/${maxAttempts} for nonce ${record.nonce} failed: ${report.reason}; retrying in ${delay}ms`,
      );
      const waited = await this.sleep(delay, signal);
      if (!waited) {
        return {
          kind: "retryable",
          reason: `shutdown during backoff after: ${lastReason}`,
          attempts: attempt,
        };
      }
    }

    console.error(
      `Attestation for nonce ${record.nonce} (tx ${record.transactionHash}) failed after ${maxAttempts} attempts: ${lastReason}`,
    );
    return { kind: "retryable", reason: lastReason, attempts: maxAttempts };
  }

  private async post(body: string, key: string): Promise<AttemptReport> {
    let response: Response;
    try {
      response = await this.fetchFn(this.config.attestationApiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.attestationApiKey}`,
          "Idempotency-Key": key,
        },
        body,
        signal: AbortSignal.timeout(this.config.attestationTimeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      return {
        result: "retryable",
        status: null,
        reason: timedOut
          ? `timed out after ${this.config.attestationTimeoutMs}ms`
          : `network error: ${errorMessage(err)}`,
      };
    }

    const result = classifyStatus(response.status);
    const detail = await readBody(response);
    return {
      result,
      status: response.status,
      reason: detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`,
    };
  }
}
