import {
	failure,
	type UpstreamFailure,
	type UpstreamFailureKind,
	type UpstreamResult,
} from "../types";

export interface RetryOptions {
	maxAttempts: number;
	backoffBaseMs: number;
	maxDelayMs: number;
	sleep?: (ms: number) => Promise<void>;
	onRetry?: (failure: UpstreamFailure, attempt: number, delayMs: number) => void;
}

// A malformed response is a data-contract problem; retrying will not fix it.
export const RETRYABLE_FAILURES: ReadonlySet<UpstreamFailureKind> = new Set([
	"timeout",
	"unreachable",
	"rate_limited",
]);

export const sleep = (ms: number) =>
	new Promise<void>((resolve) => {
		setTimeout(resolve, ms);
	});

export const backoffDelay = (
	attempt: number,
	backoffBaseMs: number,
	maxDelayMs: number
): number => Math.min(maxDelayMs, backoffBaseMs * Math.pow(2, attempt));

export async function executeWithRetry<T>(
	thunk: () => Promise<UpstreamResult<T>>,
	options: RetryOptions
): Promise<UpstreamResult<T>> {
	const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
	const wait = options.sleep ?? sleep;
	let last: UpstreamFailure = failure("unreachable", "no attempt made");

	for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
		let result: UpstreamResult<T>;
		try {
			result = await thunk();
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			result = failure("unreachable", `upstream call threw: ${message}`);
		}

		if (result.ok) {
			return result;
		}
		last = result;
		if (!RETRYABLE_FAILURES.has(result.kind) || attempt === maxAttempts - 1) {
			return last;
		}

		const delayMs = backoffDelay(attempt, options.backoffBaseMs, options.maxDelayMs);
		options.onRetry?.(result, attempt + 1, delayMs);
		if (delayMs > 0) {
			await wait(delayMs);
		}
	}

	return last;
}
