import { pino, pinoPretty } from "../deps.ts";

export type LevelName = pino.LevelWithSilent;

export let log: pino.Logger = createLogger({
  logLevel: 'info',
  logFormat: 'console',
});

export function setupLogs(opts: {
  logLevel: LevelName,
  logFormat: 'json' | 'console',
}) {
  log = createLogger(opts);
}

function createLogger(opts: {
  logLevel: LevelName,
  logFormat: 'json' | 'console',
}) {
  if (opts.logFormat == 'json') {
    return pino({ level: opts.logLevel });
  }
  return pino({ level: opts.logLevel }, pinoPretty({
    sync: true,
    colorize: false,
    ignore: 'pid,hostname',
    translateTime: 'SYS:HH:MM:ss',
  }));
}
