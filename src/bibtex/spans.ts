import type { RecordSpan, Replacement } from "./types.js";

/**
 * A record starts at `@type{key,` and runs up to the next `@type{` at the
 * start of a line, or the end of the text. Braces are not balanced, so
 * whatever sits between two records (blank lines, comments, a stray closing
 * brace) belongs to the earlier one.
 */
const RECORD_PATTERN = /@(\w+)\{([^,]+),[\s\S]*?(?=^@\w+\{|(?![\s\S]))/gm;

export function scanRecords(text: string): RecordSpan[] {
	const spans: RecordSpan[] = [];
	for (const match of text.matchAll(RECORD_PATTERN)) {
		const start = match.index ?? 0;
		spans.push({
			start,
			end: start + match[0].length,
			type: match[1],
			key: match[2].trim(),
			text: match[0],
		});
	}
	return spans;
}

/**
 * Splice replacements into `text`. They are applied from the highest start
 * offset down, so no splice moves a span that is still waiting.
 */
export function applyReplacements(text: string, replacements: readonly Replacement[]): string {
	const ordered = [...replacements].sort((a, b) => b.start - a.start);
	let result = text;
	for (const { start, end, text: replacement } of ordered) {
		result = result.slice(0, start) + replacement + result.slice(end);
	}
	return result;
}
