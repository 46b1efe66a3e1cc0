import { readFile } from "node:fs/promises";

import { TOML } from "../deps.ts";
import { isCompilerSettings, type CompilerSettings } from "../defs/config.ts";
import { SettingsError, describeCause } from "../defs/errors.ts";
import { configureProvider } from "../providers/_configure.ts";
import type { BuildOptions } from "./build.ts";

export const DefaultSettingsFile = 'zone-compiler.toml';

/**
 * Reads the optional TOML settings file.
 * A missing default file just means defaults; a missing explicit one is an error.
 */
export async function loadSettings(path: string | undefined): Promise<CompilerSettings> {
  let text: string;
  try {
    text = await readFile(path ?? DefaultSettingsFile, 'utf-8');
  } catch (err) {
    if (!path && isNotFound(err)) return {};
    throw new SettingsError(`Cannot read settings file ${path ?? DefaultSettingsFile}: ${describeCause(err)}`);
  }

  let settings: unknown;
  try {
    settings = TOML.parse(text);
  } catch (err) {
    throw new SettingsError(`Settings file ${path ?? DefaultSettingsFile} is not valid TOML: ${describeCause(err)}`);
  }
  if (!isCompilerSettings(settings)) {
    throw new SettingsError(`Settings file ${path ?? DefaultSettingsFile} was invalid`);
  }
  return settings;
}

export function resolveBuildOptions(settings: CompilerSettings, overrides: {
  zonesDir?: string,
  outputDir?: string,
  configFile?: string,
}): BuildOptions {
  return {
    zonesDir: overrides.zonesDir ?? settings.zones_dir ?? 'zones',
    outputDir: overrides.outputDir ?? settings.output_dir ?? 'compiled',
    configFile: overrides.configFile ?? settings.config_file ?? 'compiled.config.yml',
    defaultTtl: settings.default_ttl ?? 300,
    provider: configureProvider(settings.provider ?? { type: 'cloudflare' }),
  };
}

function isNotFound(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
