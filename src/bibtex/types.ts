/** Lower-cased field name → value with its outer delimiters removed. */
export type BibFields = Record<string, string>;

export interface ParsedEntry {
	start: number; // offset of the "@"
	end: number; // offset just past the closing delimiter
	type: string;
	key: string;
	fields: BibFields;
}

/** A record as found by the boundary scan. `text` is `source.slice(start, end)`. */
export interface RecordSpan {
	start: number;
	end: number;
	type: string;
	key: string;
	text: string;
}

/** A scanned span, plus its fields when the parser could read it. */
export interface BibRecord extends RecordSpan {
	fields: BibFields | null;
}

export interface Replacement {
	readonly start: number;
	readonly end: number;
	readonly text: string;
}
