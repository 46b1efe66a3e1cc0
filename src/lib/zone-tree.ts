import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";

import type { SubdomainFile, ZoneFolder } from "../defs/types.ts";
import { SettingsError, StructuralError, describeCause } from "../defs/errors.ts";
import { isValidRelativeName } from "../dns-logic/records.ts";
import { isYamlFileName, stripYamlExtension, subdomainLabel } from "../dns-logic/remap.ts";
import { log } from "./logging.ts";

const DomainLabel = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export function isPlausibleDomainName(name: string) {
  if (name.length > 253) return false;
  const labels = name.split('.');
  if (labels.length < 2) return false;
  if (!labels.every(x => DomainLabel.test(x))) return false;
  return !/^\d+$/.test(labels[labels.length - 1] ?? '');
}

/** Names of the zone folders directly under the root, in sorted order */
export async function listZoneDirectories(zonesDir: string) {
  const entries = await readdir(zonesDir, { withFileTypes: true }).catch(err => {
    throw new SettingsError(`Cannot read zones directory ${zonesDir}: ${describeCause(err)}`);
  });
  return entries
    .filter(x => x.isDirectory() && !x.name.startsWith('.'))
    .map(x => x.name)
    .sort();
}

export async function scanZoneFolder(zonesDir: string, apex: string): Promise<ZoneFolder> {
  const dir = join(zonesDir, apex);
  if (!isPlausibleDomainName(apex)) {
    throw new StructuralError(apex, dir, `zone folder ${dir} is not named like a domain`);
  }

  const topLevel = new Array<string>();
  const nested = new Array<string>();
  for await (const file of walkYamlFiles(apex, dir)) {
    (file.depth == 0 ? topLevel : nested).push(file.path);
  }

  const apexCandidates = topLevel.filter(x => stripYamlExtension(basename(x)) == apex);
  if (apexCandidates.length == 0) {
    throw new StructuralError(apex, dir,
      `zone folder ${dir} has no apex file (expected ${apex}.yml or ${apex}.yaml)`);
  }
  if (apexCandidates.length > 1) {
    throw new StructuralError(apex, dir,
      `zone folder ${dir} has more than one apex file: ${apexCandidates.join(', ')}`);
  }
  const [apexFile] = apexCandidates;

  const subdomainFiles = new Array<SubdomainFile>();
  for (const path of [...topLevel, ...nested].sort()) {
    if (path == apexFile) continue;
    const label = subdomainLabel(apex, basename(path));
    if (!label) {
      throw new StructuralError(apex, path,
        `${path} is named like the apex file but is not at the top of ${dir}`);
    }
    if (!isValidRelativeName(label)) {
      throw new StructuralError(apex, path,
        `${path} does not name a valid subdomain of ${apex}`);
    }
    subdomainFiles.push({ path, label });
  }

  return { apex, dir, apexFile, subdomainFiles };
}

async function* walkYamlFiles(zone: string, dir: string, depth = 0): AsyncGenerator<{ path: string, depth: number }> {
  const entries = await readdir(dir, { withFileTypes: true }).catch(err => {
    throw new StructuralError(zone, dir, `cannot list ${dir}: ${describeCause(err)}`);
  });
  entries.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkYamlFiles(zone, path, depth + 1);
    } else if (entry.isFile() && isYamlFileName(entry.name)) {
      yield { path, depth };
    } else {
      log.debug(`Skipping non-YAML entry ${path}`);
    }
  }
}
