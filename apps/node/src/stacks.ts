/**
 * stacks.ts
 *
 * Stacks network selection and principal checks. Every caller in the
 * journal must be a valid principal on the configured network before its
 * call reaches the ledger.
 */

import { validateStacksAddress } from "@stacks/transactions";
import { StacksDevnet, StacksMainnet, StacksTestnet, type StacksNetwork } from "@stacks/network";
import { config } from "./config";

// -----------------------------------------------------------------------
// Network
// -----------------------------------------------------------------------

export function getNetwork(name: string = config.network): StacksNetwork {
  switch (name) {
    case "mainnet":
      return new StacksMainnet();
    case "testnet":
      return new StacksTestnet();
    default:
      return new StacksDevnet();
  }
}

// -----------------------------------------------------------------------
// Principals
// -----------------------------------------------------------------------

const CONTRACT_NAME = /^[a-zA-Z][a-zA-Z0-9\-_]{0,39}$/;

/**
 * Check a standard ("SP…") or contract ("SP….name") principal: valid c32
 * checksum, and a version byte that belongs to `network`.
 */
export function isPrincipalFor(principal: string, network: StacksNetwork): boolean {
  const dot = principal.indexOf(".");
  const address = dot < 0 ? principal : principal.slice(0, dot);
  if (dot >= 0 && !CONTRACT_NAME.test(principal.slice(dot + 1))) return false;
  if (!validateStacksAddress(address)) return false;

  const prefix = address.slice(0, 2);
  return network.isMainnet() ? prefix === "SP" || prefix === "SM" : prefix === "ST" || prefix === "SN";
}

/** Split "ST1ABC…XYZ.contract-name" into [contractAddress, contractName]. */
export function parseContractId(id: string): [string, string] {
  const dot = id.lastIndexOf(".");
  if (dot < 0) throw new Error(`Invalid contract id: "${id}"`);
  return [id.slice(0, dot), id.slice(dot + 1)];
}
