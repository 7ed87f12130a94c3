import { ExponentialBackoff, handleType, noJitterGenerator, retry } from "cockatiel";
import { logger } from "../logger.js";

export class RateLimitError extends Error {
	constructor(public readonly url: string) {
		super(`Rate limited (429) by ${url}`);
		this.name = "RateLimitError";
	}
}

export class HttpError extends Error {
	constructor(
		public readonly statusCode: number,
		public readonly url: string,
	) {
		super(`HTTP ${statusCode} from ${url}`);
		this.name = "HttpError";
	}
}

/** Minimal policy interface compatible with cockatiel IPolicy and test mocks */
export interface ExecutionPolicy {
	execute<T>(fn: (context: { signal: AbortSignal }) => Promise<T>): Promise<T>;
}

/** Anything that turns a URL into a response body. */
export interface TextFetcher {
	fetchText(url: string, init?: RequestInit): Promise<string>;
}

export interface RateLimitPolicyOptions {
	/** Total attempts, the first one included. */
	maxAttempts: number;
	/** Delay before the first retry; doubles on each subsequent one. */
	baseDelayMs: number;
}

/**
 * Retry only on 429. Backoff is `baseDelayMs * 2^(attempt - 1)` without
 * jitter; every other error, transport failures included, passes straight
 * through.
 */
export function createRateLimitPolicy({ maxAttempts, baseDelayMs }: RateLimitPolicyOptions) {
	const policy = retry(handleType(RateLimitError), {
		maxAttempts: Math.max(0, maxAttempts - 1),
		backoff: new ExponentialBackoff({
			generator: noJitterGenerator,
			initialDelay: baseDelayMs,
			exponent: 2,
			maxDelay: Number.POSITIVE_INFINITY,
		}),
	});

	policy.onRetry((event) => {
		const reason = "error" in event ? event.error.message : "unexpected result";
		logger.warn(`${reason}, retrying in ${event.delay}ms`);
	});

	return policy;
}

export class ResilientFetcher implements TextFetcher {
	constructor(private readonly policy: ExecutionPolicy) {}

	async fetchText(url: string, init: RequestInit = {}): Promise<string> {
		return this.policy.execute(async ({ signal }) => {
			const response = await fetch(url, { ...init, signal });

			if (response.status === 429) {
				throw new RateLimitError(url);
			}

			if (!response.ok) {
				throw new HttpError(response.status, url);
			}

			return response.text();
		});
	}
}
