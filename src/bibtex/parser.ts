import type { BibFields, ParsedEntry } from "./types.js";

export type { BibFields, ParsedEntry } from "./types.js";

/** Block types that carry no citation record. */
const NON_RECORD_TYPES = new Set(["comment", "preamble", "string"]);

const ENTRY_TYPE = /[A-Za-z]\w*/y;
const FIELD_NAME = /[A-Za-z][\w\-:.+]*/y;
const BARE_VALUE = /[\w\-:.+/]+/y;
const WHITESPACE = /\s*/y;

class BibtexSyntaxError extends Error {
	constructor(message: string, position: number) {
		super(`${message} at offset ${position}`);
		this.name = "BibtexSyntaxError";
	}
}

/** Cursor over the source text. Positions always refer to the original string. */
class Reader {
	constructor(
		private readonly text: string,
		public pos: number,
	) {}

	get done(): boolean {
		return this.pos >= this.text.length;
	}

	peek(): string {
		return this.text[this.pos] ?? "";
	}

	sliceFrom(start: number): string {
		return this.text.slice(start, this.pos);
	}

	skipWhitespace(): void {
		WHITESPACE.lastIndex = this.pos;
		WHITESPACE.exec(this.text);
		this.pos = WHITESPACE.lastIndex;
	}

	match(pattern: RegExp): string | null {
		pattern.lastIndex = this.pos;
		const m = pattern.exec(this.text);
		if (!m) return null;
		this.pos += m[0].length;
		return m[0];
	}

	expect(char: string): void {
		if (this.peek() !== char) {
			throw new BibtexSyntaxError(`Expected "${char}"`, this.pos);
		}
		this.pos++;
	}

	/** Reads `{...}` with nested braces and returns the inner text. */
	braced(): string {
		this.expect("{");
		const start = this.pos;
		let depth = 1;
		while (!this.done) {
			const ch = this.text[this.pos++];
			if (ch === "{") depth++;
			else if (ch === "}" && --depth === 0) {
				return this.text.slice(start, this.pos - 1);
			}
		}
		throw new BibtexSyntaxError("Unbalanced braces", start);
	}

	/** Reads `"..."`; quotes inside braces do not terminate the value. */
	quoted(): string {
		this.expect('"');
		const start = this.pos;
		let depth = 0;
		while (!this.done) {
			const ch = this.text[this.pos++];
			if (ch === "{") depth++;
			else if (ch === "}") depth--;
			else if (ch === '"' && depth === 0) {
				return this.text.slice(start, this.pos - 1);
			}
		}
		throw new BibtexSyntaxError("Unterminated quoted value", start);
	}

	/** Position just past the block's closing delimiter, or null when it never closes. */
	skipBlock(open: string, close: string): number | null {
		let depth = 0;
		for (let i = this.pos; i < this.text.length; i++) {
			const ch = this.text[i];
			if (ch === open) depth++;
			else if (ch === close && --depth === 0) return i + 1;
		}
		return null;
	}
}

function readValue(reader: Reader): string {
	const parts: string[] = [];
	for (;;) {
		reader.skipWhitespace();
		const ch = reader.peek();
		if (ch === "{") {
			parts.push(reader.braced());
		} else if (ch === '"') {
			parts.push(reader.quoted());
		} else {
			const bare = reader.match(BARE_VALUE);
			if (bare === null) throw new BibtexSyntaxError("Expected a field value", reader.pos);
			parts.push(bare);
		}
		reader.skipWhitespace();
		if (reader.peek() !== "#") return parts.join("");
		reader.pos++;
	}
}

function readEntry(reader: Reader, type: string, start: number, close: string): ParsedEntry {
	reader.skipWhitespace();
	const keyStart = reader.pos;
	while (!reader.done && reader.peek() !== "," && reader.peek() !== close) {
		reader.pos++;
	}
	const key = reader.sliceFrom(keyStart).trim();
	if (!key || /[\s{}()"]/.test(key)) {
		throw new BibtexSyntaxError("Missing or malformed citation key", keyStart);
	}

	const fields: BibFields = {};
	for (;;) {
		reader.skipWhitespace();
		if (reader.peek() === close) {
			reader.pos++;
			return { start, end: reader.pos, type, key, fields };
		}
		reader.expect(",");
		reader.skipWhitespace();
		if (reader.peek() === close || reader.peek() === ",") continue;

		const name = reader.match(FIELD_NAME);
		if (name === null) throw new BibtexSyntaxError("Expected a field name", reader.pos);
		reader.skipWhitespace();
		reader.expect("=");
		fields[name.toLowerCase()] = readValue(reader);
	}
}

/**
 * Extract every citation record from BibTeX source.
 *
 * Entries may be delimited by braces or parentheses. Field names are
 * lower-cased and values lose their outer delimiters (inner braces are kept);
 * `#` concatenations are joined verbatim. An entry that does not parse is
 * left out, so callers can treat its span as a raw block.
 */
export function parseBibtex(text: string): ParsedEntry[] {
	const entries: ParsedEntry[] = [];
	let searchFrom = 0;

	while (searchFrom < text.length) {
		const at = text.indexOf("@", searchFrom);
		if (at === -1) break;

		const reader = new Reader(text, at + 1);
		const type = reader.match(ENTRY_TYPE);
		reader.skipWhitespace();
		const open = reader.peek();
		if (type === null || (open !== "{" && open !== "(")) {
			searchFrom = at + 1;
			continue;
		}
		const close = open === "{" ? "}" : ")";

		if (NON_RECORD_TYPES.has(type.toLowerCase())) {
			searchFrom = reader.skipBlock(open, close) ?? at + 1;
			continue;
		}

		reader.pos++;
		try {
			const entry = readEntry(reader, type, at, close);
			entries.push(entry);
			searchFrom = entry.end;
		} catch (err) {
			if (!(err instanceof BibtexSyntaxError)) throw err;
			searchFrom = at + 1;
		}
	}

	return entries;
}
