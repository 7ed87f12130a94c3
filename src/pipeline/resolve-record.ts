import type { BibRecord, Replacement } from "../bibtex/types.js";
import { logger } from "../logger.js";
import {
	PARSED_RECORD_CHAIN,
	type ParsedRecord,
	RAW_RECORD_CHAIN,
	type ResolutionContext,
	type StrategyChain,
	type StrategyName,
	type StrategyResult,
} from "./strategies.js";

export interface RecordOutcome {
	key: string;
	start: number;
	strategy: StrategyName;
	doi?: string;
}

export interface ResolvedRecord {
	replacement: Replacement;
	outcome: RecordOutcome;
}

const FAILURE_LABELS: Partial<Record<StrategyName, string>> = {
	arxiv: "arXiv lookup",
	"metadata-search": "Metadata search",
	doi: "DOI fetch",
	"raw-doi": "DOI fetch",
};

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

async function runChain<R extends BibRecord>(
	record: R,
	chain: StrategyChain<R>,
	context: ResolutionContext,
): Promise<{ text: string; strategy: StrategyName; doi?: string }> {
	for (const strategy of chain.steps) {
		if (!strategy.applies(record)) continue;

		let result: StrategyResult;
		try {
			result = await strategy.resolve(record, context);
		} catch (err) {
			result = { status: "failed", error: toError(err) };
		}

		if (result.status === "resolved") {
			return { text: result.text, strategy: strategy.name, doi: result.doi };
		}
		if (result.status === "skipped") {
			logger.info(result.reason);
		} else {
			const label = FAILURE_LABELS[strategy.name] ?? strategy.name;
			logger.warn(`${label} failed for ${record.key}: ${result.error.message}`);
		}
	}

	logger.debug(`Keeping original text of ${record.key}`);
	return { text: chain.terminal.render(record), strategy: chain.terminal.name };
}

/**
 * Resolve one record to its replacement text. The first strategy that
 * resolves wins; skipped and failed ones hand over to the next, and the
 * chain's terminal step catches whatever is left. Never rejects on a lookup
 * failure.
 */
export async function resolveRecord(record: BibRecord, context: ResolutionContext): Promise<ResolvedRecord> {
	const { fields } = record;
	const resolved = fields
		? await runChain<ParsedRecord>({ ...record, fields }, PARSED_RECORD_CHAIN, context)
		: await runChain<BibRecord>(record, RAW_RECORD_CHAIN, context);

	return {
		replacement: { start: record.start, end: record.end, text: resolved.text },
		outcome: {
			key: record.key,
			start: record.start,
			strategy: resolved.strategy,
			...(resolved.doi ? { doi: resolved.doi } : {}),
		},
	};
}
