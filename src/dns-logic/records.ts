import { createHash } from "node:crypto";

import type {
  RecordPayload, RecordSet, RecordType,
  SourceLocation, SourcedRecordSet,
  ValueCAA, ValueMX, ValueSRV,
} from "../defs/types.ts";
import { isRecordType } from "../defs/types.ts";

const AllowedRecordKeys = new Set(['type', 'ttl', 'value', 'values', 'octodns']);

const NameLabel = /^(?:[a-z0-9_]|[a-z0-9_][a-z0-9_-]{0,61}[a-z0-9_])$/;

/** Problems found in a single record definition. The caller attaches file and zone. */
export class RecordProblem extends Error {
  override name = 'RecordProblem';
}

export function isRecordMapping(raw: unknown): raw is Record<string, unknown> {
  return raw != null && typeof raw === 'object' && !Array.isArray(raw);
}

/** Apex-relative names: '' or dotted labels, optionally led by a '*' wildcard */
export function isValidRelativeName(name: string) {
  if (name === '') return true;
  const labels = name.split('.');
  return labels.every((label, idx) =>
    (idx == 0 && label == '*') || NameLabel.test(label));
}

/**
 * Reads every record definition out of one parsed zone-style document
 * (a mapping of name to one record or a list of records).
 * Problems are collected per definition so one bad record doesn't hide the rest.
 */
export function readRecordDocument(doc: Record<string, unknown>, file: string) {
  const records = new Array<SourcedRecordSet>();
  const problems = new Array<{ name: string, problem: string }>();

  for (const [name, raw] of Object.entries(doc)) {
    if (!isValidRelativeName(name)) {
      problems.push({ name, problem: `invalid record name` });
      continue;
    }
    const definitions = Array.isArray(raw) ? raw : [raw];
    for (const definition of definitions) {
      try {
        const source: SourceLocation = { file, name };
        records.push({ source, record: parseRecordDefinition(name, definition) });
      } catch (err) {
        if (!(err instanceof RecordProblem)) throw err;
        problems.push({ name, problem: err.message });
      }
    }
  }

  return { records, problems };
}

export function parseRecordDefinition(name: string, raw: unknown): RecordSet {
  if (!isRecordMapping(raw)) {
    throw new RecordProblem(`definition must be a mapping`);
  }
  for (const key of Object.keys(raw)) {
    if (!AllowedRecordKeys.has(key)) {
      throw new RecordProblem(`unexpected field "${key}"`);
    }
  }

  const { type, ttl, octodns } = raw;
  if (typeof type !== 'string') {
    throw new RecordProblem(`missing "type"`);
  }
  if (!isRecordType(type)) {
    throw new RecordProblem(`unsupported record type ${type}`);
  }
  if (ttl === undefined) {
    throw new RecordProblem(`${type} record is missing "ttl"`);
  }
  if (!isCount(ttl)) {
    throw new RecordProblem(`"ttl" must be a non-negative integer`);
  }

  const record: RecordSet = { name, ttl, ...parsePayload(type, raw) };
  if (octodns !== undefined) {
    if (!isRecordMapping(octodns)) {
      throw new RecordProblem(`"octodns" must be a mapping`);
    }
    record.octodns = octodns;
  }
  return canonicalizeRecord(record);
}

function parsePayload(type: RecordType, raw: Record<string, unknown>): RecordPayload {
  const hasValue = raw.value !== undefined;
  const hasValues = raw.values !== undefined;
  if (hasValue && hasValues) {
    throw new RecordProblem(`${type} record has both "value" and "values"`);
  }
  if (!hasValue && !hasValues) {
    throw new RecordProblem(`${type} record has neither "value" nor "values"`);
  }

  switch (type) {
    case 'CNAME':
    case 'PTR':
      if (hasValues) {
        throw new RecordProblem(`${type} record takes a single "value"`);
      }
      return { type, value: readString(raw.value, `${type} value`) };
    case 'A':
    case 'AAAA':
    case 'NS':
    case 'TXT':
      return { type, values: readList(raw, x => readString(x, `${type} value`)) };
    case 'MX':
      return { type, values: readList(raw, readMX) };
    case 'SRV':
      return { type, values: readList(raw, readSRV) };
    case 'CAA':
      return { type, values: readList(raw, readCAA) };
    default: {
      const _: never = type;
    }
  }
  throw new Error(`BUG: unhandled record type ${type}`);
}

function readList<T>(raw: Record<string, unknown>, reader: (entry: unknown) => T): T[] {
  const entries = raw.values !== undefined ? raw.values : [raw.value];
  if (!Array.isArray(entries)) {
    throw new RecordProblem(`"values" must be a list`);
  }
  if (entries.length == 0) {
    throw new RecordProblem(`"values" must not be empty`);
  }
  return entries.map(reader);
}

function readString(raw: unknown, what: string): string {
  if (typeof raw !== 'string' || raw === '') {
    throw new RecordProblem(`${what} must be a non-empty string`);
  }
  return raw;
}

function isCount(raw: unknown): raw is number {
  return typeof raw === 'number' && Number.isInteger(raw) && raw >= 0;
}

function readFields<K extends string>(type: RecordType, raw: unknown, required: readonly K[], optional: readonly string[] = []) {
  if (!isRecordMapping(raw)) {
    throw new RecordProblem(`${type} value must be a mapping`);
  }
  const missing = required.filter(key => raw[key] === undefined);
  if (missing.length) {
    throw new RecordProblem(`${type} value is missing ${missing.map(x => `"${x}"`).join(', ')}`);
  }
  for (const key of Object.keys(raw)) {
    if (!required.some(x => x === key) && !optional.includes(key)) {
      throw new RecordProblem(`${type} value has unexpected field "${key}"`);
    }
  }
  return raw;
}

function readNumberField(type: RecordType, raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (!isCount(value)) {
    throw new RecordProblem(`${type} "${key}" must be a non-negative integer`);
  }
  return value;
}

function readMX(raw: unknown): ValueMX {
  const fields = readFields('MX', raw, ['preference', 'exchange']);
  return {
    preference: readNumberField('MX', fields, 'preference'),
    exchange: readString(fields.exchange, `MX "exchange"`),
  };
}

function readSRV(raw: unknown): ValueSRV {
  const fields = readFields('SRV', raw, ['priority', 'weight', 'port', 'target']);
  return {
    priority: readNumberField('SRV', fields, 'priority'),
    weight: readNumberField('SRV', fields, 'weight'),
    port: readNumberField('SRV', fields, 'port'),
    target: readString(fields.target, `SRV "target"`),
  };
}

function readCAA(raw: unknown): ValueCAA {
  const fields = readFields('CAA', raw, ['tag', 'value'], ['flags']);
  return {
    flags: fields.flags === undefined ? 0 : readNumberField('CAA', fields, 'flags'),
    tag: readString(fields.tag, `CAA "tag"`),
    value: readString(fields.value, `CAA "value"`),
  };
}

/** Sorts and de-duplicates a record's values by their JSON form */
export function canonicalizeRecord(record: RecordSet): RecordSet {
  switch (record.type) {
    case 'CNAME':
    case 'PTR':
      return record;
    case 'A':
    case 'AAAA':
    case 'NS':
    case 'TXT':
      return { ...record, values: canonicalValues(record.values) };
    case 'MX':
      return { ...record, values: canonicalValues(record.values) };
    case 'SRV':
      return { ...record, values: canonicalValues(record.values) };
    case 'CAA':
      return { ...record, values: canonicalValues(record.values) };
    default: {
      const _: never = record;
    }
  }
  throw new Error(`BUG: unhandled record ${JSON.stringify(record)}`);
}

function canonicalValues<T>(values: T[]): T[] {
  const byKey = new Map<string, T>();
  for (const value of values) {
    byKey.set(JSON.stringify(value), value);
  }
  return Array.from(byKey.keys())
    .sort(compareStrings)
    .flatMap(key => {
      const value = byKey.get(key);
      return value === undefined ? [] : [value];
    });
}

export function compareStrings(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** (name, type) - at most one RecordSet per key survives a merge */
export function getRecordKey(record: RecordSet) {
  return JSON.stringify([record.name, record.type]);
}

/** Everything that makes two definitions of one key the same definition */
export function getContentKey(record: RecordSet) {
  const payload = 'value' in record ? record.value : record.values;
  return JSON.stringify([record.ttl, payload, sortedKeys(record.octodns ?? null)]);
}

export function getContentHash(record: RecordSet) {
  return createHash('sha256').update(getContentKey(record)).digest('hex');
}

function sortedKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortedKeys);
  if (!isRecordMapping(value)) return value;
  return Object.fromEntries(Object.keys(value)
    .sort(compareStrings)
    .map(key => [key, sortedKeys(value[key])]));
}
