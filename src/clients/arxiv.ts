import { load } from "cheerio";
import type { TextFetcher } from "../resilience/resilient-fetch.js";
import { NoIdentifierOnPageError } from "./errors.js";

export interface PreprintDoiLookup {
	findJournalDoi(arxivId: string): Promise<string>;
}

const DOI_RESOLVER_LINK = /^https?:\/\/(?:dx\.)?doi\.org\/(.+)$/i;
// arXiv mints a DataCite DOI for every preprint; it names the preprint, not the journal version.
const ARXIV_DATACITE_PREFIX = /^10\.48550\/arxiv\./i;

/** `https://arxiv.org/abs/2101.00001v2/` → `2101.00001v2`; old-style `hep-th/9901001` ids keep their slash. */
export function extractArxivId(url: string): string | null {
	const marker = "arxiv.org/abs/";
	const at = url.indexOf(marker);
	if (at === -1) return null;
	const id = url
		.slice(at + marker.length)
		.replace(/[?#].*$/, "")
		.replace(/\/+$/, "");
	return id || null;
}

/** DOI carried by a resolver link such as `https://doi.org/10.1000/xyz`, or null. */
export function doiFromResolverLink(href: string): string | null {
	const match = href.trim().match(DOI_RESOLVER_LINK);
	if (!match) return null;
	try {
		return decodeURIComponent(match[1]);
	} catch {
		return match[1];
	}
}

export class ArxivClient implements PreprintDoiLookup {
	constructor(
		private readonly fetcher: TextFetcher,
		private readonly absUrl = "https://arxiv.org/abs",
	) {}

	async findJournalDoi(arxivId: string): Promise<string> {
		const html = await this.fetcher.fetchText(`${this.absUrl}/${arxivId}`);
		const $ = load(html);

		for (const anchor of $("a[href]").toArray()) {
			const doi = doiFromResolverLink($(anchor).attr("href") ?? "");
			if (doi && !ARXIV_DATACITE_PREFIX.test(doi)) {
				return doi;
			}
		}

		throw new NoIdentifierOnPageError(arxivId);
	}
}
