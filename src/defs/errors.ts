import type { RecordType, SourceLocation } from "./types.ts";

export type ZoneErrorKind =
  | 'structural'
  | 'schema'
  | 'merge-conflict'
  | 'constraint'
;

/** Anything that fails the build of one zone without touching the others. */
export abstract class ZoneError extends Error {
  abstract readonly kind: ZoneErrorKind;
  constructor(
    public readonly zone: string,
    message: string,
  ) {
    super(message);
  }
}

/** Missing apex file, unreadable file, malformed YAML, bad folder name */
export class StructuralError extends ZoneError {
  override name = 'StructuralError';
  readonly kind = 'structural';
  constructor(zone: string, public readonly path: string, message: string) {
    super(zone, message);
  }
}

export class SchemaError extends ZoneError {
  override name = 'SchemaError';
  readonly kind = 'schema';
  constructor(
    zone: string,
    public readonly file: string,
    public readonly recordName: string,
    problem: string,
  ) {
    super(zone, `${file}: record "${displayName(recordName)}": ${problem}`);
  }
}

export class MergeConflictError extends ZoneError {
  override name = 'MergeConflictError';
  readonly kind = 'merge-conflict';
  constructor(
    zone: string,
    public readonly key: { name: string, type: RecordType },
    public readonly first: SourceLocation,
    public readonly second: SourceLocation,
  ) {
    super(zone, `conflicting ${key.type} definitions for "${displayName(key.name)}" in ${first.file} and ${second.file}`);
  }
}

export class ConstraintError extends ZoneError {
  override name = 'ConstraintError';
  readonly kind = 'constraint';
  constructor(zone: string, public readonly recordName: string, problem: string) {
    super(zone, `record "${displayName(recordName)}": ${problem}`);
  }
}

/** Writing the compiled output failed; nothing from this build can be trusted. */
export class OutputError extends Error {
  override name = 'OutputError';
  constructor(public readonly path: string, options: { cause: unknown }) {
    super(`Failed to write ${path}: ${describeCause(options.cause)}`, options);
  }
}

/** An octoDNS command could not be started at all, usually because it isn't installed. */
export class ToolError extends Error {
  override name = 'ToolError';
  constructor(public readonly command: string, options: { cause: unknown }) {
    super(`Could not run ${command}: ${describeCause(options.cause)}`, options);
  }
}

/** The settings file or the command line asked for something unusable. */
export class SettingsError extends Error {
  override name = 'SettingsError';
}

/** The apex is shown as '@' */
export function displayName(name: string) {
  return name === '' ? '@' : name;
}

export function describeCause(cause: unknown) {
  return cause instanceof Error ? cause.message : String(cause);
}
