/**
 * A RecordSet is what a zone file says about one (name, type) pair.
 * Names are always relative to the zone apex, with '' being the apex itself.
 */
export type RecordSet = {
	name: string;
	ttl: number;
	/** Provider-specific metadata, carried through untouched */
	octodns?: Record<string, unknown>;
} & RecordPayload;

export type RecordPayload =
	| RecordStrings
	| RecordSingle
	| RecordMX
	| RecordSRV
	| RecordCAA
;

export type RecordStrings = {
	type: 'A' | 'AAAA' | 'NS' | 'TXT';
	values: string[];
}

export type RecordSingle = {
	type: 'CNAME' | 'PTR';
	value: string;
}

export type RecordMX = {
	type: 'MX';
	values: ValueMX[];
}
export type ValueMX = {
	preference: number;
	exchange: string;
}

export type RecordSRV = {
	type: 'SRV';
	values: ValueSRV[];
}
export type ValueSRV = {
	priority: number;
	weight: number;
	port: number;
	target: string;
}

export type RecordCAA = {
	type: 'CAA';
	values: ValueCAA[];
}
export type ValueCAA = {
	flags: number;
	tag: string;
	value: string;
}

export type RecordType = RecordPayload['type'];

/** Fixed ordering of record types within one name of a compiled zone */
export const RecordTypeOrder: Record<RecordType, number> = {
	'A': 0,
	'AAAA': 1,
	'CAA': 2,
	'CNAME': 3,
	'MX': 4,
	'NS': 5,
	'PTR': 6,
	'SRV': 7,
	'TXT': 8,
};

export function isRecordType(raw: string): raw is RecordType {
	return Object.prototype.hasOwnProperty.call(RecordTypeOrder, raw);
}

/** Where a record definition was written, before any remapping */
export interface SourceLocation {
	/** Path of the YAML file the definition came from */
	file: string;
	/** The record name exactly as written in that file */
	name: string;
}

export interface SourcedRecordSet {
	record: RecordSet;
	source: SourceLocation;
}

/** One directory under the zones root, named after its apex domain */
export interface ZoneFolder {
	apex: string;
	dir: string;
	apexFile: string;
	subdomainFiles: Array<SubdomainFile>;
}

export interface SubdomainFile {
	path: string;
	/** Apex-relative name that this file's records get suffixed with */
	label: string;
}

export interface CompiledZone {
	apex: string;
	records: Array<RecordSet>;
}

/** How the generated octoDNS config talks to the one downstream DNS provider */
export interface ProviderBinding {
	config: { type: string };
	/** Key of this provider under `providers:` in the octoDNS config */
	readonly providerId: string;
	/** The provider's octoDNS settings, credentials only as `env/NAME` references */
	RenderSettings(): Record<string, unknown>;
	/** Environment variables octoDNS will need to actually reach the provider */
	RequiredEnvironment(): Array<string>;
}
