import { cleanProtectedCase } from "../bibtex/normalize.js";
import type { BibFields, BibRecord } from "../bibtex/types.js";
import { renderEntry, renderMiscEntry } from "../bibtex/writer.js";
import { extractArxivId, type PreprintDoiLookup } from "../clients/arxiv.js";
import type { MetadataSearch } from "../clients/crossref-search.js";
import type { DoiCitationSource } from "../clients/doi-citation.js";
import type { DedupGuard } from "./dedup-guard.js";

export type StrategyName =
	| "web-link"
	| "arxiv"
	| "metadata-search"
	| "doi"
	| "fallback"
	| "raw-doi"
	| "raw-verbatim";

export type StrategyResult =
	| { status: "resolved"; text: string; doi?: string }
	| { status: "skipped"; reason: string }
	| { status: "failed"; error: Error };

/** Everything a strategy may touch. `guard` is the only state shared between records. */
export interface ResolutionContext {
	guard: DedupGuard;
	citations: DoiCitationSource;
	search: MetadataSearch;
	preprints: PreprintDoiLookup;
	now: () => Date;
}

export type ParsedRecord = BibRecord & { fields: BibFields };

/**
 * One step of the chain. `resolve` may throw; the chain records a throw as a
 * failed result and moves on.
 */
export interface ResolutionStrategy<R extends BibRecord = BibRecord> {
	readonly name: StrategyName;
	applies(record: R): boolean;
	resolve(record: R, context: ResolutionContext): Promise<StrategyResult>;
}

/** Last resort of a chain. Local only, so it cannot fail. */
export interface TerminalStrategy<R extends BibRecord = BibRecord> {
	readonly name: StrategyName;
	render(record: R): string;
}

export interface StrategyChain<R extends BibRecord> {
	steps: readonly ResolutionStrategy<R>[];
	terminal: TerminalStrategy<R>;
}

function field(record: ParsedRecord, name: string): string {
	return (record.fields[name] ?? "").trim();
}

function isoDate(date: Date): string {
	const month = String(date.getMonth() + 1).padStart(2, "0");
	const day = String(date.getDate()).padStart(2, "0");
	return `${date.getFullYear()}-${month}-${day}`;
}

/** Claim first, fetch second: a duplicate never costs a request. */
async function claimAndFetch(doi: string, key: string, context: ResolutionContext): Promise<StrategyResult> {
	if (!context.guard.claim(doi)) {
		return { status: "skipped", reason: `Skipping duplicate DOI ${doi} for ${key}` };
	}
	const bibtex = await context.citations.fetchBibtex(doi);
	return { status: "resolved", text: cleanProtectedCase(bibtex), doi };
}

export const webLinkStrategy: ResolutionStrategy<ParsedRecord> = {
	name: "web-link",
	applies: (record) => {
		const url = field(record, "url");
		return !field(record, "doi") && url !== "" && !url.includes("doi.org") && !url.includes("arxiv.org/abs");
	},
	resolve: async (record, { now }) => {
		const today = now();
		const misc = renderMiscEntry({
			key: record.key,
			author: record.fields.author ?? "",
			title: (record.fields.title ?? "").replace(/\n/g, " ").trim(),
			url: field(record, "url"),
			year: record.fields.year ?? String(today.getFullYear()),
			accessed: isoDate(today),
		});
		return { status: "resolved", text: cleanProtectedCase(misc) };
	},
};

export const arxivStrategy: ResolutionStrategy<ParsedRecord> = {
	name: "arxiv",
	applies: (record) => !field(record, "doi") && field(record, "url").includes("arxiv.org/abs"),
	resolve: async (record, context) => {
		const arxivId = extractArxivId(field(record, "url"));
		if (!arxivId) {
			return { status: "skipped", reason: `No arXiv id in url of ${record.key}` };
		}
		const doi = await context.preprints.findJournalDoi(arxivId);
		return claimAndFetch(doi, record.key, context);
	},
};

export const metadataSearchStrategy: ResolutionStrategy<ParsedRecord> = {
	name: "metadata-search",
	applies: (record) => !field(record, "doi"),
	resolve: async (record, context) => {
		const doi = await context.search.findDoi(record.fields.title ?? "", record.fields.author ?? "");
		return claimAndFetch(doi, record.key, context);
	},
};

export const doiStrategy: ResolutionStrategy<ParsedRecord> = {
	name: "doi",
	applies: (record) => field(record, "doi") !== "",
	resolve: (record, context) => claimAndFetch(field(record, "doi"), record.key, context),
};

export const originalFormattingStrategy: TerminalStrategy<ParsedRecord> = {
	name: "fallback",
	render: (record) => cleanProtectedCase(renderEntry(record)),
};

const RAW_DOI_FIELD = /DOI\s*=\s*\{([^}]+)\}/i;
const RAW_URL_FIELD = /url\s*=\s*\{([^}]+)\}/i;

/** DOI from a `doi = {…}` field, or from a `url = {…}` pointing at doi.org. */
export function findDoiInRawBlock(block: string): string | null {
	const doiField = block.match(RAW_DOI_FIELD);
	if (doiField) return doiField[1].trim();

	const urlField = block.match(RAW_URL_FIELD);
	if (urlField?.[1].includes("doi.org")) {
		return urlField[1].split("doi.org/").pop()?.trim() || null;
	}
	return null;
}

export const rawDoiStrategy: ResolutionStrategy = {
	name: "raw-doi",
	applies: () => true,
	resolve: async (record, context) => {
		const doi = findDoiInRawBlock(record.text);
		if (!doi) {
			return { status: "skipped", reason: `No DOI in unparsed block ${record.key}` };
		}
		return claimAndFetch(doi, record.key, context);
	},
};

export const rawVerbatimStrategy: TerminalStrategy = {
	name: "raw-verbatim",
	render: (record) => cleanProtectedCase(record.text),
};

/** Trust order for records with parsed fields. */
export const PARSED_RECORD_CHAIN: StrategyChain<ParsedRecord> = {
	steps: [webLinkStrategy, arxivStrategy, metadataSearchStrategy, doiStrategy],
	terminal: originalFormattingStrategy,
};

/** Reduced chain for spans the parser could not read. */
export const RAW_RECORD_CHAIN: StrategyChain<BibRecord> = {
	steps: [rawDoiStrategy],
	terminal: rawVerbatimStrategy,
};
