import { z } from "zod";
import type { TextFetcher } from "../resilience/resilient-fetch.js";
import { NoCandidateError, NoExactTitleMatchError } from "./errors.js";

const SEARCH_ROWS = 5;

const WorksResponseSchema = z.object({
	message: z
		.object({
			items: z
				.array(
					z.object({
						DOI: z.string(),
						title: z.array(z.string()).optional(),
					}),
				)
				.default([]),
		})
		.default({}),
});

export interface MetadataSearch {
	findDoi(title: string, author: string): Promise<string>;
}

/** Drop TeX markup (backslashes and braces) from a BibTeX title. */
export function stripTitleMarkup(title: string): string {
	return title.replace(/[\\{}]/g, "").trim();
}

/** Letters, digits and underscores only, lower-cased. */
export function normalizeTitle(title: string): string {
	return title.replace(/[^\p{L}\p{N}_]+/gu, "").toLowerCase();
}

/**
 * Crossref bibliographic search. A candidate is accepted only when its
 * normalized title equals the query's; near misses are rejected outright.
 */
export class CrossrefSearchClient implements MetadataSearch {
	constructor(
		private readonly fetcher: TextFetcher,
		private readonly worksUrl = "https://api.crossref.org/works",
		private readonly mailto?: string,
	) {}

	async findDoi(title: string, author: string): Promise<string> {
		const cleanTitle = stripTitleMarkup(title);
		const params = new URLSearchParams({
			"query.title": cleanTitle,
			"query.author": author,
			rows: String(SEARCH_ROWS),
		});
		if (this.mailto) params.set("mailto", this.mailto);

		const body = await this.fetcher.fetchText(`${this.worksUrl}?${params}`, {
			headers: { Accept: "application/json" },
		});
		const { items } = WorksResponseSchema.parse(JSON.parse(body)).message;
		if (items.length === 0) {
			throw new NoCandidateError(cleanTitle);
		}

		const target = normalizeTitle(cleanTitle);
		const match = target
			? items.find((item) => normalizeTitle(item.title?.[0] ?? "") === target)
			: undefined;
		if (!match) {
			throw new NoExactTitleMatchError(
				cleanTitle,
				items.map((item) => item.title?.[0] ?? ""),
			);
		}
		return match.DOI;
	}
}
