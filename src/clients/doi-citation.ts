import { logger } from "../logger.js";
import { HttpError, type TextFetcher } from "../resilience/resilient-fetch.js";

export interface DoiCitationSource {
	fetchBibtex(doi: string): Promise<string>;
}

/**
 * DOI → BibTeX. doi2bib is asked first; only its 404 sends the request on to
 * Crossref's transform endpoint. Every other failure propagates.
 */
export class DoiCitationClient implements DoiCitationSource {
	constructor(
		private readonly fetcher: TextFetcher,
		private readonly doi2bibUrl = "https://doi2bib.org/bib",
		private readonly crossrefWorksUrl = "https://api.crossref.org/works",
	) {}

	async fetchBibtex(doi: string): Promise<string> {
		try {
			return await this.fetcher.fetchText(`${this.doi2bibUrl}/${doi}`);
		} catch (err) {
			if (!(err instanceof HttpError) || err.statusCode !== 404) {
				throw err;
			}
			logger.info(`doi2bib miss for ${doi}, using Crossref fallback`);
		}

		return this.fetcher.fetchText(`${this.crossrefWorksUrl}/${doi}/transform/application/x-bibtex`, {
			headers: { Accept: "application/x-bibtex" },
		});
	}
}
