import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	type ExecutionPolicy,
	HttpError,
	RateLimitError,
	ResilientFetcher,
	createRateLimitPolicy,
} from "../resilient-fetch.js";

// Pass-through policy for isolated fetcher testing
function createPassthroughPolicy(): ExecutionPolicy {
	return {
		execute: <T>(fn: (ctx: { signal: AbortSignal }) => Promise<T>) =>
			fn({ signal: new AbortController().signal }),
	};
}

function response(status: number, body = "") {
	return {
		status,
		ok: status >= 200 && status < 300,
		text: () => Promise.resolve(body),
	};
}

describe("ResilientFetcher", () => {
	let mockFetch: ReturnType<typeof vi.fn>;

	beforeEach(() => {
		mockFetch = vi.fn();
		vi.stubGlobal("fetch", mockFetch);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("returns the response body on HTTP 200", async () => {
		mockFetch.mockResolvedValue(response(200, "@article{x}"));
		const fetcher = new ResilientFetcher(createPassthroughPolicy());

		await expect(fetcher.fetchText("https://example.org/a")).resolves.toBe("@article{x}");
	});

	it("passes request headers through to fetch", async () => {
		mockFetch.mockResolvedValue(response(200, "{}"));
		const fetcher = new ResilientFetcher(createPassthroughPolicy());

		await fetcher.fetchText("https://example.org/a", { headers: { Accept: "application/json" } });

		expect(mockFetch).toHaveBeenCalledWith(
			"https://example.org/a",
			expect.objectContaining({ headers: { Accept: "application/json" } }),
		);
	});

	it("throws HttpError on a non-429 failure without retrying", async () => {
		mockFetch.mockResolvedValue(response(404));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 3, baseDelayMs: 1 }));

		const error = await fetcher.fetchText("https://example.org/missing").catch((err: unknown) => err);

		expect(error).toBeInstanceOf(HttpError);
		expect(error).toMatchObject({ statusCode: 404, url: "https://example.org/missing" });
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	it("retries after a 429 and returns the later success", async () => {
		mockFetch.mockResolvedValueOnce(response(429)).mockResolvedValueOnce(response(200, "ok"));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 3, baseDelayMs: 1 }));

		await expect(fetcher.fetchText("https://example.org/busy")).resolves.toBe("ok");
		expect(mockFetch).toHaveBeenCalledTimes(2);
	});

	it("raises RateLimitError once every attempt was rate limited", async () => {
		mockFetch.mockResolvedValue(response(429));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 3, baseDelayMs: 1 }));

		await expect(fetcher.fetchText("https://example.org/busy")).rejects.toBeInstanceOf(RateLimitError);
		expect(mockFetch).toHaveBeenCalledTimes(3);
	});

	it("does not retry when maxAttempts is 1", async () => {
		mockFetch.mockResolvedValue(response(429));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 1, baseDelayMs: 1 }));

		await expect(fetcher.fetchText("https://example.org/busy")).rejects.toBeInstanceOf(RateLimitError);
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	it("propagates transport errors immediately", async () => {
		mockFetch.mockRejectedValue(new TypeError("fetch failed"));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 3, baseDelayMs: 1 }));

		await expect(fetcher.fetchText("https://example.org/down")).rejects.toThrow("fetch failed");
		expect(mockFetch).toHaveBeenCalledTimes(1);
	});

	it("doubles the backoff delay between attempts", async () => {
		vi.useFakeTimers();
		mockFetch.mockResolvedValue(response(429));
		const fetcher = new ResilientFetcher(createRateLimitPolicy({ maxAttempts: 3, baseDelayMs: 1000 }));

		const outcome = fetcher.fetchText("https://example.org/busy").catch((err: unknown) => err);

		await vi.advanceTimersByTimeAsync(0);
		expect(mockFetch).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(999);
		expect(mockFetch).toHaveBeenCalledTimes(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(mockFetch).toHaveBeenCalledTimes(2);

		await vi.advanceTimersByTimeAsync(1999);
		expect(mockFetch).toHaveBeenCalledTimes(2);
		await vi.advanceTimersByTimeAsync(1);
		expect(mockFetch).toHaveBeenCalledTimes(3);

		expect(await outcome).toBeInstanceOf(RateLimitError);
	});
});
