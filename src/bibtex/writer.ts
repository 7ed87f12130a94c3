import type { BibFields } from "./types.js";

export interface RenderableEntry {
	type: string;
	key: string;
	fields: BibFields;
}

/** One-space indent, fields sorted by name, every value braced. */
export function renderEntry({ type, key, fields }: RenderableEntry): string {
	const lines = Object.keys(fields)
		.sort()
		.map((name) => ` ${name} = {${fields[name]}}`);
	if (lines.length === 0) {
		return `@${type}{${key}\n}\n`;
	}
	return `@${type}{${key},\n${lines.join(",\n")}\n}\n`;
}

export interface MiscEntry {
	key: string;
	author: string;
	title: string;
	url: string;
	year: string;
	accessed: string; // YYYY-MM-DD
}

/** `@misc` record for a plain web resource, with the access date in `note`. */
export function renderMiscEntry({ key, author, title, url, year, accessed }: MiscEntry): string {
	return [
		`@misc{${key},`,
		`  author       = {${author}},`,
		`  title        = {${title}},`,
		`  howpublished = {\\url{${url}}},`,
		`  year         = {${year}},`,
		`  note         = {Accessed: ${accessed}},`,
		"}",
		"",
	].join("\n");
}
