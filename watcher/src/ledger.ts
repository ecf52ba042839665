import { ethers } from "ethers";
import type { EventSelector } from "./abis.js";
import type { Config } from "./config.js";
import { LedgerFatalError, LedgerUnavailableError, errorMessage } from "./errors.js";
import type { RawLogEntry } from "./types.js";

/** Read-only access to the source ledger. */
export interface LedgerClient {
  getChainId(): Promise<number>;
  getLatestHeight(): Promise<number>;
  getEvents(
    fromHeight: number,
    toHeight: number,
    selector: EventSelector,
  ): Promise<RawLogEntry[]>;
}

// Retrying these cannot succeed
const FATAL_CODES = [
  "INVALID_ARGUMENT",
  "UNSUPPORTED_OPERATION",
  "NOT_IMPLEMENTED",
] as const;

/**
 * Maps a provider error onto the two failure classes the scanner acts on.
 * Anything not known to be permanent is treated as transient; persistent
 * transient failures are caught by the scanner's give-up threshold.
 */
export function classifyLedgerError(
  err: unknown,
  operation: string,
): LedgerUnavailableError | LedgerFatalError {
  if (
    err instanceof LedgerUnavailableError ||
    err instanceof LedgerFatalError
  ) {
    return err;
  }

  const message = `${operation} failed: ${errorMessage(err)}`;

  if (ethers.isError(err, "SERVER_ERROR")) {
    const status = err.response?.statusCode;
    if (status === 401 || status === 403) {
      return new LedgerFatalError(
        `${operation} rejected with HTTP ${status}`,
        { cause: err },
      );
    }
    return new LedgerUnavailableError(message, { cause: err });
  }

  for (const code of FATAL_CODES) {
    if (ethers.isError(err, code)) {
      return new LedgerFatalError(message, { cause: err });
    }
  }

  return new LedgerUnavailableError(message, { cause: err });
}

export function createEthersLedgerClient(
  config: Readonly<Config>,
): LedgerClient {
  const request = new ethers.FetchRequest(config.sourceChainRpcUrl);
  request.timeout = config.rpcTimeoutMs;

  // Static network: skip ethers' network detection retry loop, getChainId
  // asks the node directly instead.
  const provider = new ethers.JsonRpcProvider(request, config.sourceChainId, {
    staticNetwork: true,
  });

  async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw classifyLedgerError(err, operation);
    }
  }

  return {
    async getChainId(): Promise<number> {
      const result: unknown = await call("eth_chainId", () =>
        provider.send("eth_chainId", []),
      );
      if (typeof result !== "string") {
        throw new LedgerFatalError(`eth_chainId returned ${String(result)}`);
      }
      return Number(ethers.getBigInt(result));
    },

    getLatestHeight(): Promise<number> {
      return call("eth_blockNumber", () => provider.getBlockNumber());
    },

    async getEvents(
      fromHeight: number,
      toHeight: number,
      selector: EventSelector,
    ): Promise<RawLogEntry[]> {
      const logs = await call(`eth_getLogs [${fromHeight}, ${toHeight}]`, () =>
        provider.getLogs({
          address: selector.address,
          topics: [selector.topic0],
          fromBlock: fromHeight,
          toBlock: toHeight,
        }),
      );

      return logs
        .filter((log) => !log.removed)
        .map((log) => {
          const args = parseArgs(selector, log);
          // Address and topic0 matched, so the configured ABI is wrong
          if (args === null) {
            throw new LedgerFatalError(
              `log ${log.transactionHash}:${log.index} from ${selector.address} does not decode as ${selector.fragment.format("sighash")}`,
            );
          }
          return {
            transactionHash: log.transactionHash,
            blockNumber: log.blockNumber,
            logIndex: log.index,
            args,
          };
        });
    },
  };
}

/** Decoded event fields by name, or null when the log does not match the ABI. */
export function parseArgs(
  selector: EventSelector,
  log: { topics: readonly string[]; data: string },
): Record<string, unknown> | null {
  let parsed: ethers.LogDescription | null;
  try {
    parsed = selector.iface.parseLog({ topics: [...log.topics], data: log.data });
  } catch (err) {
    console.warn(`Undecodable ${selector.fragment.name} log: ${errorMessage(err)}`);
    return null;
  }
  if (!parsed) return null;

  const values = parsed.args;
  const args: Record<string, unknown> = {};
  selector.fragment.inputs.forEach((input, i) => {
    args[input.name] = values[i];
  });
  return args;
}
