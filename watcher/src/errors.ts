export class WatcherError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or malformed configuration. Raised before anything starts. */
export class ConfigurationError extends WatcherError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super("CONFIGURATION", `${variable}: ${message}`);
    this.variable = variable;
  }
}

/** Transient ledger failure (network, timeout, 5xx, rate limit). */
export class LedgerUnavailableError extends WatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LEDGER_UNAVAILABLE", message, options);
  }
}

/** Ledger failure that retrying will not fix (auth, bad endpoint, ABI mismatch). */
export class LedgerFatalError extends WatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LEDGER_FATAL", message, options);
  }
}

export class LedgerGaveUpError extends WatcherError {
  readonly failures: number;

  constructor(failures: number, options?: { cause?: unknown }) {
    super(
      "LEDGER_GAVE_UP",
      `ledger unavailable for ${failures} consecutive scans`,
      options,
    );
    this.failures = failures;
  }
}

export class ChainMismatchError extends WatcherError {
  constructor(expected: number, actual: number) {
    super(
      "CHAIN_MISMATCH",
      `RPC endpoint reports chain ${actual}, expected ${expected}`,
    );
  }
}

/** A single log entry could not be turned into an EventRecord. */
export class DecodingError extends WatcherError {
  readonly transactionHash: string | null;
  readonly logIndex: number | null;

  constructor(
    message: string,
    transactionHash: string | null,
    logIndex: number | null,
  ) {
    super("DECODING", message);
    this.transactionHash = transactionHash;
    this.logIndex = logIndex;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
