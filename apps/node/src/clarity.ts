/**
 * clarity.ts
 *
 * Encodes ledger events the way the staking contract prints them: a Clarity
 * tuple per event, `event` naming the topic. Chainhook delivers both the
 * serialized tuple (`raw_value`) and a decoded JSON value; the indexer
 * reads the JSON.
 */

import { Cl, cvToHex, type ClarityValue, type TupleCV } from "@stacks/transactions";
import type { LedgerEvent } from "@yieldlock/types";

type EventField = bigint | number | string | boolean;
type JsonField = string | number | boolean;

// Fields holding principals. Everything else that is a string is ASCII.
const PRINCIPAL_FIELDS = new Set(["staker"]);
const PRINTABLE_ASCII = /^[\x20-\x7E]*$/;

function fieldToClarity(key: string, value: EventField): ClarityValue {
  if (typeof value === "bigint" || typeof value === "number") return Cl.uint(value);
  if (typeof value === "boolean") return Cl.bool(value);
  if (PRINCIPAL_FIELDS.has(key)) return Cl.principal(value);
  if (!PRINTABLE_ASCII.test(value)) {
    throw new Error(`Field "${key}" is not printable ASCII: ${JSON.stringify(value)}`);
  }
  return Cl.stringAscii(value);
}

function fields(event: LedgerEvent): [string, EventField][] {
  const record: Record<string, EventField> = event;
  return Object.entries(record);
}

/**
 * The print tuple for `event`. Throws if a principal field is malformed or
 * a string field is not printable ASCII.
 */
export function eventToClarity(event: LedgerEvent): TupleCV {
  const data: Record<string, ClarityValue> = {};
  for (const [key, value] of fields(event)) data[key] = fieldToClarity(key, value);
  return Cl.tuple(data);
}

export function eventToHex(event: LedgerEvent): string {
  return cvToHex(eventToClarity(event));
}

/**
 * Decoded JSON form. Amounts become numbers while they fit in a double
 * exactly, and decimal strings beyond that.
 */
export function eventToJson(event: LedgerEvent): Record<string, JsonField> {
  const json: Record<string, JsonField> = {};
  for (const [key, value] of fields(event)) {
    if (typeof value === "bigint") {
      const asNumber = Number(value);
      json[key] = Number.isSafeInteger(asNumber) ? asNumber : value.toString();
    } else {
      json[key] = value;
    }
  }
  return json;
}
