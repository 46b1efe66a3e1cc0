import type { RecordSet, SourcedRecordSet } from "../defs/types.ts";

const YamlExtension = /\.ya?ml$/i;

export function isYamlFileName(fileName: string) {
  return YamlExtension.test(fileName);
}

export function stripYamlExtension(fileName: string) {
  return fileName.replace(YamlExtension, '');
}

/**
 * Works out where a subdomain file sits relative to its zone apex.
 * `sub.example.com.yml` in `example.com` is `sub`;
 * a file that doesn't spell out the apex (`staging.yml`) is already relative.
 * Returns '' for the apex file itself.
 */
export function subdomainLabel(apex: string, fileName: string) {
  const stem = stripYamlExtension(fileName);
  if (stem == apex) return '';
  if (stem.endsWith(`.${apex}`)) {
    return stem.slice(0, -(apex.length + 1));
  }
  return stem;
}

/** Moves a name written inside a subdomain file into the apex's namespace. */
export function remapName(localName: string, label: string) {
  if (!label) return localName;
  if (!localName) return label;
  return `${localName}.${label}`;
}

export function remapRecords(records: Array<SourcedRecordSet>, label: string): Array<SourcedRecordSet> {
  return records.map(({ record, source }) => ({
    source,
    record: relabel(record, remapName(record.name, label)),
  }));
}

function relabel(record: RecordSet, name: string): RecordSet {
  return { ...record, name };
}
