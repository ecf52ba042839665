import { ethers } from "ethers";

export const BRIDGE_TRANSFER_INITIATED =
  "event BridgeTransferInitiated(address indexed sender, address indexed recipient, uint256 indexed destinationChainId, address token, uint256 amount, uint256 nonce)";

// Event inputs every EventRecord is built from. A signature with the same
// names but another type or `indexed` flag can share the topic hash and
// still decode into the wrong words, so all three must match.
export const REQUIRED_EVENT_INPUTS = [
  { name: "sender", type: "address", indexed: true },
  { name: "recipient", type: "address", indexed: true },
  { name: "destinationChainId", type: "uint256", indexed: true },
  { name: "token", type: "address", indexed: false },
  { name: "amount", type: "uint256", indexed: false },
  { name: "nonce", type: "uint256", indexed: false },
] as const;

export interface EventSelector {
  address: string;
  topic0: string;
  fragment: ethers.EventFragment;
  iface: ethers.Interface;
}

function layout(type: string, indexed: boolean): string {
  return indexed ? `${type} indexed` : type;
}

/**
 * Parses a human-readable event signature into the topic filter the ledger
 * client queries with. Throws when the signature does not parse, lacks an
 * input the record decoder needs, or declares one with another layout.
 */
export function createEventSelector(
  address: string,
  signature: string,
): EventSelector {
  const fragment = ethers.EventFragment.from(signature);
  const inputs = new Map(fragment.inputs.map((input) => [input.name, input]));

  const missing = REQUIRED_EVENT_INPUTS.filter(({ name }) => !inputs.has(name));
  if (missing.length > 0) {
    throw new Error(
      `event ${fragment.name} lacks inputs: ${missing.map(({ name }) => name).join(", ")}`,
    );
  }

  const mismatched: string[] = [];
  for (const expected of REQUIRED_EVENT_INPUTS) {
    const input = inputs.get(expected.name);
    if (!input) continue;
    const actual = layout(input.type, input.indexed === true);
    const wanted = layout(expected.type, expected.indexed);
    if (actual !== wanted) {
      mismatched.push(`${expected.name} is ${actual} (expected ${wanted})`);
    }
  }
  if (mismatched.length > 0) {
    throw new Error(`event ${fragment.name} input layout: ${mismatched.join(", ")}`);
  }

  return {
    address,
    topic0: fragment.topicHash,
    fragment,
    iface: new ethers.Interface([fragment]),
  };
}
