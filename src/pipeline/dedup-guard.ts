/** DOIs are case-insensitive, so claims compare on the trimmed, lower-cased form. */
function doiKey(doi: string): string {
	return doi.trim().toLowerCase();
}

/**
 * DOIs already emitted during one enrichment run. Claims are never released,
 * even when the fetch that follows a claim fails.
 */
export class DedupGuard {
	/** Normalized key → DOI as first claimed. */
	private readonly claimed = new Map<string, string>();

	/** True on the first claim of `doi`, false on every later one. */
	claim(doi: string): boolean {
		const key = doiKey(doi);
		if (this.claimed.has(key)) return false;
		this.claimed.set(key, doi.trim());
		return true;
	}

	has(doi: string): boolean {
		return this.claimed.has(doiKey(doi));
	}

	get size(): number {
		return this.claimed.size;
	}

	/** Claimed DOIs in claim order, spelled as first claimed. */
	values(): string[] {
		return [...this.claimed.values()];
	}
}
