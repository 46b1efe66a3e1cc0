import type { ZoneError } from "../defs/errors.ts";
import { log } from "./logging.ts";

export interface ZoneFailure {
  zone: string;
  errors: Array<ZoneError>;
}

export function formatFailureReport(failures: Array<ZoneFailure>, zoneCount: number) {
  const lines = [
    `Build failed for ${failures.length} of ${zoneCount} zones:`,
  ];
  for (const failure of failures) {
    for (const error of failure.errors) {
      lines.push(`  ${failure.zone}: [${error.kind}] ${error.message}`);
    }
  }
  return lines.join('\n');
}

export function printBuildSummary(opts: {
  compiled: Array<{ apex: string }>,
  failures: Array<ZoneFailure>,
}) {
  const zoneCount = opts.compiled.length + opts.failures.length;
  if (opts.failures.length) {
    log.error(formatFailureReport(opts.failures, zoneCount));
  } else {
    log.info(`Compiled all ${zoneCount} zones: ${opts.compiled.map(x => x.apex).join(', ')}`);
  }
}
