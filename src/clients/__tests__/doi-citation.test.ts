import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type ExecutionPolicy, HttpError, ResilientFetcher } from "../../resilience/resilient-fetch.js";
import { DoiCitationClient } from "../doi-citation.js";

function createPassthroughPolicy(): ExecutionPolicy {
	return {
		execute: <T>(fn: (ctx: { signal: AbortSignal }) => Promise<T>) =>
			fn({ signal: new AbortController().signal }),
	};
}

function response(status: number, body = "") {
	return { status, ok: status >= 200 && status < 300, text: () => Promise.resolve(body) };
}

describe("DoiCitationClient", () => {
	let mockFetch: ReturnType<typeof vi.fn>;
	let client: DoiCitationClient;

	beforeEach(() => {
		mockFetch = vi.fn();
		vi.stubGlobal("fetch", mockFetch);
		client = new DoiCitationClient(new ResilientFetcher(createPassthroughPolicy()));
	});

	afterEach(() => {
		vi.unstubAllGlobals();
		vi.restoreAllMocks();
	});

	it("returns the doi2bib record", async () => {
		mockFetch.mockResolvedValue(response(200, "@article{x, doi = {10.1/x}}\n"));

		await expect(client.fetchBibtex("10.1/x")).resolves.toBe("@article{x, doi = {10.1/x}}\n");
		expect(mockFetch).toHaveBeenCalledTimes(1);
		expect(mockFetch).toHaveBeenCalledWith("https://doi2bib.org/bib/10.1/x", expect.anything());
	});

	it("falls back to the Crossref transform when doi2bib answers 404", async () => {
		mockFetch
			.mockResolvedValueOnce(response(404))
			.mockResolvedValueOnce(response(200, "@article{y, doi = {10.2/y}}\n"));

		await expect(client.fetchBibtex("10.2/y")).resolves.toBe("@article{y, doi = {10.2/y}}\n");
		expect(mockFetch).toHaveBeenLastCalledWith(
			"https://api.crossref.org/works/10.2/y/transform/application/x-bibtex",
			expect.objectContaining({ headers: { Accept: "application/x-bibtex" } }),
		);
	});

	it("propagates other doi2bib failures without asking Crossref", async () => {
		mockFetch.mockResolvedValue(response(500));

		await expect(client.fetchBibtex("10.3/z")).rejects.toMatchObject({ name: "HttpError", statusCode: 500 });
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	it("propagates a Crossref failure after the fallback", async () => {
		mockFetch.mockResolvedValue(response(404));

		const error = await client.fetchBibtex("10.4/w").catch((err: unknown) => err);

		expect(error).toBeInstanceOf(HttpError);
		expect(error).toMatchObject({
			statusCode: 404,
			url: "https://api.crossref.org/works/10.4/w/transform/application/x-bibtex",
		});
	});

	it("uses the configured base URLs", async () => {
		const custom = new DoiCitationClient(
			new ResilientFetcher(createPassthroughPolicy()),
			"https://bib.test/bib",
			"https://works.test/works",
		);
		mockFetch.mockResolvedValueOnce(response(404)).mockResolvedValueOnce(response(200, "x"));

		await custom.fetchBibtex("10.5/v");

		expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
			"https://bib.test/bib/10.5/v",
			"https://works.test/works/10.5/v/transform/application/x-bibtex",
		]);
	});
});
