import { mkdir } from "node:fs/promises";

import type {
  CompiledZone, ProviderBinding, SourcedRecordSet,
} from "../defs/types.ts";
import {
  OutputError, SchemaError, StructuralError, ZoneError,
  describeCause,
} from "../defs/errors.ts";

import { readRecordDocument } from "../dns-logic/records.ts";
import { remapRecords } from "../dns-logic/remap.ts";
import { mergeZoneRecords } from "../dns-logic/merge.ts";
import { checkZoneConstraints } from "../dns-logic/constraints.ts";
import { normalizeRecords } from "../dns-logic/normalize.ts";

import { listZoneDirectories, scanZoneFolder } from "../lib/zone-tree.ts";
import { loadYamlMapping } from "../lib/yaml-files.ts";
import {
  pruneCompiledZones, renderProviderConfig,
  writeCompiledZone, writeProviderConfig,
} from "../lib/emitter.ts";
import type { ZoneFailure } from "../lib/printing.ts";
import { log } from "../lib/logging.ts";

export interface BuildOptions {
  zonesDir: string;
  outputDir: string;
  configFile: string;
  defaultTtl: number;
  provider: ProviderBinding;
}

export interface BuildResult {
  compiled: Array<CompiledZone>;
  failures: Array<ZoneFailure>;
  /** Zones whose stale compiled file was removed */
  pruned: Array<string>;
}

export type ZoneResult =
  | { ok: true, zone: CompiledZone }
  | { ok: false, failure: ZoneFailure }
;

/** One parsed YAML file of a zone folder, and the label its names get remapped under */
export interface ZoneDocument {
  path: string;
  label: string;
  data: Record<string, unknown>;
}

/**
 * Compiles every zone folder independently, writes out the ones that worked,
 * then rewrites the octoDNS config.
 * Zone problems are returned, not thrown; only output failures throw.
 * `onCompiled` sees the compile results before anything is written,
 * so zone failures can be reported even when writing then fails.
 */
export async function runBuild(
  opts: BuildOptions,
  onCompiled?: (result: Pick<BuildResult, 'compiled' | 'failures'>) => void,
): Promise<BuildResult> {
  const zoneNames = await listZoneDirectories(opts.zonesDir);
  if (zoneNames.length == 0) {
    log.warn(`No zones found under ${opts.zonesDir}`);
  }

  const compiled = new Array<CompiledZone>();
  const failures = new Array<ZoneFailure>();
  for (const apex of zoneNames) {
    const result = await compileZone(opts.zonesDir, apex);
    if (result.ok) {
      log.info(`Compiled ${apex}: ${result.zone.records.length} record sets`);
      compiled.push(result.zone);
    } else {
      log.debug(`Zone ${apex} failed with ${result.failure.errors.length} errors`);
      failures.push(result.failure);
    }
  }
  onCompiled?.({ compiled, failures });

  await mkdir(opts.outputDir, { recursive: true }).catch(err => {
    throw new OutputError(opts.outputDir, { cause: err });
  });
  for (const zone of compiled) {
    await writeCompiledZone(opts.outputDir, zone);
  }
  const pruned = await pruneCompiledZones(opts.outputDir, new Set(zoneNames));

  await writeProviderConfig(opts.configFile, renderProviderConfig(opts));

  return { compiled, failures, pruned };
}

/** Loads one zone folder from disk and compiles it, never throwing for zone-local problems. */
export async function compileZone(zonesDir: string, apex: string): Promise<ZoneResult> {
  try {
    const folder = await scanZoneFolder(zonesDir, apex);

    const documents = new Array<ZoneDocument>();
    const errors = new Array<ZoneError>();
    const files = [
      { path: folder.apexFile, label: '' },
      ...folder.subdomainFiles,
    ];
    for (const file of files) {
      try {
        documents.push({ ...file, data: await loadYamlMapping(apex, file.path) });
      } catch (err) {
        if (!(err instanceof ZoneError)) throw err;
        errors.push(err);
      }
    }
    if (errors.length) {
      return { ok: false, failure: { zone: apex, errors } };
    }

    return compileZoneDocuments(apex, documents);

  } catch (err) {
    const error = err instanceof ZoneError ? err
      : new StructuralError(apex, zonesDir, `unexpected failure: ${describeCause(err)}`);
    return { ok: false, failure: { zone: apex, errors: [error] } };
  }
}

/**
 * The in-memory half of a zone build: remap, merge, check, normalize.
 * Schema problems from every file are reported together,
 * and merging only happens once all files are well-formed.
 */
export function compileZoneDocuments(apex: string, documents: Array<ZoneDocument>): ZoneResult {
  const fail = (errors: Array<ZoneError>): ZoneResult =>
    ({ ok: false, failure: { zone: apex, errors } });

  const schemaErrors = new Array<ZoneError>();
  const definitions = new Array<SourcedRecordSet>();
  for (const document of documents) {
    const { records, problems } = readRecordDocument(document.data, document.path);
    for (const { name, problem } of problems) {
      schemaErrors.push(new SchemaError(apex, document.path, name, problem));
    }
    definitions.push(...remapRecords(records, document.label));
  }
  if (schemaErrors.length) return fail(schemaErrors);

  const { records, conflicts } = mergeZoneRecords(apex, definitions);
  if (conflicts.length) return fail(conflicts);

  const violations = checkZoneConstraints(apex, records);
  if (violations.length) return fail(violations);

  return { ok: true, zone: { apex, records: normalizeRecords(records) } };
}
