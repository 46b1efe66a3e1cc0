import { readFile } from "node:fs/promises";

import { YAML } from "../deps.ts";
import { StructuralError, describeCause } from "../defs/errors.ts";
import { isRecordMapping } from "../dns-logic/records.ts";

/**
 * Loads one YAML record file. An empty file is an empty mapping;
 * anything else that isn't a mapping, or doesn't parse, fails the zone.
 */
export async function loadYamlMapping(zone: string, path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new StructuralError(zone, path, `cannot read ${path}: ${describeCause(err)}`);
  }

  let data: unknown;
  try {
    data = YAML.load(text, {
      filename: path,
      schema: YAML.CORE_SCHEMA,
    });
  } catch (err) {
    const reason = err instanceof YAML.YAMLException ? err.reason : describeCause(err);
    throw new StructuralError(zone, path, `malformed YAML in ${path}: ${reason}`);
  }

  if (data == null) return {};
  if (!isRecordMapping(data)) {
    throw new StructuralError(zone, path, `top level of ${path} must be a mapping`);
  }
  return data;
}

const DumpOptions: YAML.DumpOptions = {
  sortKeys: false,
  lineWidth: -1,
  noRefs: true,
};

export function renderYaml(data: unknown) {
  return '---\n' + YAML.dump(data, DumpOptions);
}

/**
 * Renders a top-level mapping exactly in the given key order.
 * Each key is dumped on its own since plain objects hoist integer-like keys
 * and treat `__proto__` specially.
 */
export function renderYamlEntries(entries: Iterable<[string, unknown]>) {
  let text = '---\n';
  for (const [key, value] of entries) {
    text += YAML.dump(Object.fromEntries([[key, value]]), DumpOptions);
  }
  return text;
}
