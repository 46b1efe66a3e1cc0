import type { RecordSet } from "../defs/types.ts";
import { RecordTypeOrder } from "../defs/types.ts";

import {
  canonicalizeRecord, compareStrings,
  getContentHash, getContentKey, getRecordKey,
} from "./records.ts";

/**
 * Orders RecordSets by name, then by RecordTypeOrder,
 * then by a hash of the payload so that even repeated keys land in a fixed order.
 */
export function compareRecordSets(a: RecordSet, b: RecordSet) {
  return compareStrings(a.name, b.name)
    || RecordTypeOrder[a.type] - RecordTypeOrder[b.type]
    || compareStrings(getContentHash(a), getContentHash(b));
}

/** Canonical form for emission: sorted values, no exact repeats, fixed order */
export function normalizeRecords(records: Array<RecordSet>) {
  const seen = new Set<string>();
  const unique = new Array<RecordSet>();
  for (const record of records.map(canonicalizeRecord)) {
    const identity = `${getRecordKey(record)} ${getContentKey(record)}`;
    if (seen.has(identity)) continue;
    seen.add(identity);
    unique.push(record);
  }
  return unique.sort(compareRecordSets);
}
