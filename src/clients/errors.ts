export class NoCandidateError extends Error {
	constructor(public readonly title: string) {
		super(`No DOI candidates for "${title}"`);
		this.name = "NoCandidateError";
	}
}

export class NoExactTitleMatchError extends Error {
	constructor(
		public readonly title: string,
		public readonly candidates: string[],
	) {
		super(`No exact-match DOI for "${title}"`);
		this.name = "NoExactTitleMatchError";
	}
}

export class NoIdentifierOnPageError extends Error {
	constructor(public readonly arxivId: string) {
		super(`No journal DOI on arXiv page ${arxivId}`);
		this.name = "NoIdentifierOnPageError";
	}
}
