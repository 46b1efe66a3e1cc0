import type { RecordSet, SourcedRecordSet } from "../defs/types.ts";
import { MergeConflictError } from "../defs/errors.ts";
import { log } from "../lib/logging.ts";

import { getContentKey, getRecordKey } from "./records.ts";

/**
 * Folds record definitions from every file of one zone into a single set,
 * at most one RecordSet per (name, type).
 *
 * Repeating a definition verbatim is allowed and collapses to one copy.
 * Any other repeat is a conflict naming the first definition and the one
 * that disagrees with it; every definition of a key is compared against the first.
 */
export function mergeZoneRecords(zone: string, definitions: Array<SourcedRecordSet>) {
  const merged = new Map<string, SourcedRecordSet & { contentKey: string }>();
  const conflicts = new Array<MergeConflictError>();

  for (const definition of definitions) {
    const key = getRecordKey(definition.record);
    const contentKey = getContentKey(definition.record);

    const first = merged.get(key);
    if (!first) {
      merged.set(key, { ...definition, contentKey });
      continue;
    }

    if (first.contentKey == contentKey) {
      log.debug(`Duplicate ${definition.record.type} "${definition.record.name}" in ${definition.source.file} matches ${first.source.file}, keeping one`);
      continue;
    }

    conflicts.push(new MergeConflictError(zone, {
      name: definition.record.name,
      type: definition.record.type,
    }, first.source, definition.source));
  }

  const records = new Array<RecordSet>();
  for (const { record } of merged.values()) {
    records.push(record);
  }
  return { records, conflicts };
}
