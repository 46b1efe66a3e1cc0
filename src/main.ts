#!/usr/bin/env -S npx tsx

import { parseArgs } from "node:util";

import { OutputError, SettingsError, ToolError } from "./defs/errors.ts";
import { loadSettings, resolveBuildOptions } from "./controller/configure.ts";
import { runBuild } from "./controller/build.ts";
import { runSync, runValidate } from "./controller/sync.ts";
import { printBuildSummary } from "./lib/printing.ts";
import { log, setupLogs } from "./lib/logging.ts";

const Commands = ['build', 'validate', 'sync'] as const;
type Command = typeof Commands[number];

const ExitZoneFailures = 1;
const ExitFatal = 2;

const { values: flags, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    'zones-dir': { type: 'string' },
    'output-dir': { type: 'string' },
    'config-file': { type: 'string' },
    'settings': { type: 'string' },
    'doit': { type: 'boolean', default: false },
    'debug': { type: 'boolean', default: false },
    'log-as-json': { type: 'boolean', default: false },
  },
});

setupLogs({
  logLevel: flags.debug ? 'debug' : 'info',
  logFormat: flags['log-as-json'] ? 'json' : 'console',
});

process.exitCode = await main(positionals[0] ?? 'build');

async function main(command: string): Promise<number> {
  if (!isCommand(command)) {
    log.error(`Unknown command "${command}", expected one of: ${Commands.join(', ')}`);
    return ExitFatal;
  }

  try {
    const settings = await loadSettings(flags.settings);
    const opts = resolveBuildOptions(settings, {
      zonesDir: flags['zones-dir'],
      outputDir: flags['output-dir'],
      configFile: flags['config-file'],
    });
    log.debug(`Resolved options: ${JSON.stringify({ ...opts, provider: opts.provider.config })}`);

    const result = await runBuild(opts, printBuildSummary);
    if (result.failures.length) return ExitZoneFailures;

    switch (command) {
      case 'build':
        return 0;
      case 'validate':
        return await runValidate(opts.configFile);
      case 'sync':
        return await runSync({
          configFile: opts.configFile,
          provider: opts.provider,
          doit: flags.doit ?? false,
        });
    }
  } catch (err) {
    if (err instanceof SettingsError || err instanceof OutputError || err instanceof ToolError) {
      log.error(err.message);
      return ExitFatal;
    }
    throw err;
  }
}

function isCommand(raw: string): raw is Command {
  return Commands.some(x => x === raw);
}
