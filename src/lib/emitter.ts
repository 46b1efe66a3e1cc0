import { mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { CompiledZone, ProviderBinding, RecordSet } from "../defs/types.ts";
import { OutputError, describeCause } from "../defs/errors.ts";
import { log } from "./logging.ts";
import { renderYaml, renderYamlEntries } from "./yaml-files.ts";

/** Name of the octoDNS source provider that reads our compiled directory */
export const CompiledSourceId = 'config';

export function compiledZonePath(outputDir: string, apex: string) {
  return join(outputDir, `${apex}.yaml`);
}

/**
 * One octoDNS YamlProvider zone document.
 * Records come in already sorted; names with a single type are written as a
 * bare record, names with several as a list. The apex key is always present.
 */
export function renderZoneDocument(zone: CompiledZone) {
  const byName = new Map<string, Array<Record<string, unknown>>>([['', []]]);
  for (const record of zone.records) {
    let entries = byName.get(record.name);
    if (!entries) {
      entries = [];
      byName.set(record.name, entries);
    }
    entries.push(renderRecord(record));
  }

  return renderYamlEntries(Array.from(byName, ([name, entries]): [string, unknown] =>
    [name, entries.length == 1 ? entries[0] : entries]));
}

function renderRecord(record: RecordSet): Record<string, unknown> {
  const rendered: Record<string, unknown> = {
    type: record.type,
    ttl: record.ttl,
  };
  if ('value' in record) {
    rendered.value = record.value;
  } else if (record.values.length == 1) {
    rendered.value = record.values[0];
  } else {
    rendered.values = record.values;
  }
  if (record.octodns) {
    rendered.octodns = record.octodns;
  }
  return rendered;
}

/**
 * The octoDNS configuration: compiled directory as the only source,
 * one target provider, and a '*' zone so new zone folders need no edits here.
 */
export function renderProviderConfig(opts: {
  outputDir: string,
  defaultTtl: number,
  provider: ProviderBinding,
}) {
  return renderYaml({
    providers: {
      [CompiledSourceId]: {
        class: 'octodns.provider.yaml.YamlProvider',
        directory: opts.outputDir.replaceAll('\\', '/'),
        default_ttl: opts.defaultTtl,
        enforce_order: false,
      },
      [opts.provider.providerId]: opts.provider.RenderSettings(),
    },
    zones: {
      '*': {
        sources: [CompiledSourceId],
        targets: [opts.provider.providerId],
      },
    },
  });
}

export async function writeCompiledZone(outputDir: string, zone: CompiledZone) {
  const path = compiledZonePath(outputDir, zone.apex);
  await writeAtomically(path, renderZoneDocument(zone));
  log.debug(`Wrote ${zone.records.length} record sets to ${path}`);
  return path;
}

/**
 * Drops compiled files whose zone folder is gone.
 * Zones that merely failed this time keep their previous output.
 */
export async function pruneCompiledZones(outputDir: string, knownZones: Set<string>) {
  const removed = new Array<string>();
  const entries = await readdir(outputDir, { withFileTypes: true }).catch(err => {
    throw new OutputError(outputDir, { cause: err });
  });
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith('.yaml')) continue;
    const apex = entry.name.slice(0, -'.yaml'.length);
    if (knownZones.has(apex)) continue;

    const path = join(outputDir, entry.name);
    await rm(path).catch(err => {
      throw new OutputError(path, { cause: err });
    });
    log.info(`Removed ${path}, its zone folder no longer exists`);
    removed.push(apex);
  }
  return removed;
}

export async function writeProviderConfig(path: string, contents: string) {
  await writeAtomically(path, contents);
  log.debug(`Wrote octoDNS config to ${path}`);
}

async function writeAtomically(path: string, contents: string) {
  const tempPath = join(dirname(path), `.${process.pid}.tmp`);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, contents, 'utf-8');
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true }).catch(cleanupErr => {
      log.warn(`Could not clean up ${tempPath}: ${describeCause(cleanupErr)}`);
    });
    throw new OutputError(path, { cause: err });
  }
}
