import { readFile, writeFile } from "node:fs/promises";
import { parseBibtex } from "./bibtex/parser.js";
import { applyReplacements, scanRecords } from "./bibtex/spans.js";
import type { BibRecord, ParsedEntry, Replacement } from "./bibtex/types.js";
import { ArxivClient, type PreprintDoiLookup } from "./clients/arxiv.js";
import { CrossrefSearchClient, type MetadataSearch } from "./clients/crossref-search.js";
import { DoiCitationClient, type DoiCitationSource } from "./clients/doi-citation.js";
import type { Config } from "./config.js";
import { logger } from "./logger.js";
import { DedupGuard } from "./pipeline/dedup-guard.js";
import { type RecordOutcome, resolveRecord } from "./pipeline/resolve-record.js";
import type { ResolutionContext, StrategyName } from "./pipeline/strategies.js";
import { ResilientFetcher, createRateLimitPolicy } from "./resilience/resilient-fetch.js";

export interface EnricherSources {
	citations: DoiCitationSource;
	search: MetadataSearch;
	preprints: PreprintDoiLookup;
	now?: () => Date;
}

export interface EnrichmentResult {
	text: string;
	outcomes: RecordOutcome[];
	claimedDois: string[];
}

function decodeDroppingInvalid(bytes: Uint8Array): string {
	return new TextDecoder("utf-8", { ignoreBOM: true }).decode(bytes).replace(/\uFFFD/g, "");
}

/**
 * UTF-8 decode that drops invalid byte sequences instead of failing. A leading
 * BOM is kept, and so is a U+FFFD actually encoded in the input (`EF BF BD`).
 */
export function decodeLenient(bytes: Uint8Array): string {
	const pieces: string[] = [];
	let from = 0;
	for (let i = 0; i + 2 < bytes.length; i++) {
		if (bytes[i] === 0xef && bytes[i + 1] === 0xbf && bytes[i + 2] === 0xbd) {
			pieces.push(decodeDroppingInvalid(bytes.subarray(from, i)));
			from = i + 3;
			i += 2;
		}
	}
	pieces.push(decodeDroppingInvalid(bytes.subarray(from)));
	return pieces.join("\uFFFD");
}

function summarize(outcomes: RecordOutcome[]): string {
	const counts = new Map<StrategyName, number>();
	for (const { strategy } of outcomes) {
		counts.set(strategy, (counts.get(strategy) ?? 0) + 1);
	}
	const parts = [...counts].map(([strategy, count]) => `${strategy}=${count}`);
	return `Resolved ${outcomes.length} record(s)${parts.length ? `: ${parts.join(", ")}` : ""}`;
}

export class BibEnricher {
	constructor(private readonly sources: EnricherSources) {}

	/**
	 * Resolve every record of `raw`, one at a time in source order, and splice
	 * the results back. Text outside the records comes through unchanged. Each
	 * call starts with an empty dedup guard.
	 */
	async enrichText(raw: string): Promise<EnrichmentResult> {
		const context: ResolutionContext = {
			guard: new DedupGuard(),
			citations: this.sources.citations,
			search: this.sources.search,
			preprints: this.sources.preprints,
			now: this.sources.now ?? (() => new Date()),
		};

		const parsedByOffset = new Map<number, ParsedEntry>(
			parseBibtex(raw).map((entry) => [entry.start, entry]),
		);

		const replacements: Replacement[] = [];
		const outcomes: RecordOutcome[] = [];
		for (const span of scanRecords(raw)) {
			const record: BibRecord = { ...span, fields: parsedByOffset.get(span.start)?.fields ?? null };
			const { replacement, outcome } = await resolveRecord(record, context);
			replacements.push(replacement);
			outcomes.push(outcome);
		}

		logger.info(summarize(outcomes));
		return {
			text: applyReplacements(raw, replacements),
			outcomes,
			claimedDois: context.guard.values(),
		};
	}

	/** Output is written once, after every record is resolved; a failed run writes nothing. */
	async enrichFile(inputPath: string, outputPath: string): Promise<EnrichmentResult> {
		const raw = decodeLenient(await readFile(inputPath));
		const result = await this.enrichText(raw);
		await writeFile(outputPath, result.text, "utf-8");
		logger.info(`Finished writing enriched .bib to ${outputPath}`);
		return result;
	}
}

export function createEnricher(config: Config): BibEnricher {
	const fetcher = new ResilientFetcher(
		createRateLimitPolicy({
			maxAttempts: config.HTTP_MAX_ATTEMPTS,
			baseDelayMs: config.HTTP_BACKOFF_MS,
		}),
	);

	return new BibEnricher({
		citations: new DoiCitationClient(fetcher, config.DOI2BIB_URL, config.CROSSREF_WORKS_URL),
		search: new CrossrefSearchClient(fetcher, config.CROSSREF_WORKS_URL, config.CROSSREF_MAILTO),
		preprints: new ArxivClient(fetcher, config.ARXIV_ABS_URL),
	});
}
