/** `title = {{A}bc}`: an initial braced letter directly inside the title's own braces. */
const DOUBLE_BRACED_TITLE = /(title\s*=\s*)\{\{([A-Za-z])\}(.*?)\}/gs;
const SINGLE_LETTER_GROUP = /\{([A-Za-z])\}/g;

function cleanOnce(text: string): string {
	return text
		.replace(DOUBLE_BRACED_TITLE, (_match, prefix: string, initial: string, rest: string) => `${prefix}{${initial}${rest}}`)
		.replace(SINGLE_LETTER_GROUP, "$1");
}

/**
 * Undo the case-protection artifacts doi2bib and Crossref put in titles:
 * `title = {{A}new result}` becomes `title = {Anew result}`, and any stray
 * `{X}` around a single letter loses its braces.
 *
 * Stripping one group can expose another (`{{a}}`), so the rewrite runs to a
 * fixed point. Each pass that changes anything removes characters, which
 * bounds the loop and makes the function idempotent.
 */
export function cleanProtectedCase(text: string): string {
	let current = text;
	for (;;) {
		const next = cleanOnce(current);
		if (next === current) return current;
		current = next;
	}
}
