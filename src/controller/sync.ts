import { spawn } from "node:child_process";

import type { ProviderBinding } from "../defs/types.ts";
import { SettingsError, ToolError } from "../defs/errors.ts";
import { log } from "../lib/logging.ts";

/** Runs an external command to completion and reports its exit status */
export interface ToolRunner {
  run(command: string, args: Array<string>): Promise<number>;
}

export class SpawnRunner implements ToolRunner {
  run(command: string, args: Array<string>) {
    return new Promise<number>((ok, fail) => {
      const child = spawn(command, args, { stdio: 'inherit' });
      child.once('error', err => fail(new ToolError(command, { cause: err })));
      child.once('exit', (code, signal) => {
        if (signal) {
          log.warn(`${command} was terminated by ${signal}`);
        }
        ok(code ?? 1);
      });
    });
  }
}

/** Offline check of the compiled config and zone files */
export async function runValidate(configFile: string, runner: ToolRunner = new SpawnRunner()) {
  log.info(`Validating ${configFile} with octodns-validate...`);
  return await runner.run('octodns-validate', [`--config-file=${configFile}`]);
}

/**
 * Plans (and with `doit`, applies) the compiled records against the provider.
 * octoDNS resolves credentials itself, so all we do is make sure they're present.
 */
export async function runSync(opts: {
  configFile: string,
  provider: ProviderBinding,
  doit: boolean,
  env?: Record<string, string | undefined>,
}, runner: ToolRunner = new SpawnRunner()) {
  const env = opts.env ?? process.env;
  const missing = opts.provider.RequiredEnvironment().filter(x => !env[x]);
  if (missing.length) {
    throw new SettingsError(`Cannot sync to ${opts.provider.providerId} without ${missing.join(', ')} in the environment`);
  }

  const args = [`--config-file=${opts.configFile}`];
  if (opts.doit) {
    log.warn(`Applying compiled records to ${opts.provider.providerId}...`);
    args.push('--doit');
  } else {
    log.info("Planning only, pass --doit to apply changes");
  }
  return await runner.run('octodns-sync', args);
}
