import { setTimeout as delay } from "node:timers/promises";
import { MAX_TIMER_MS } from "../utils/duration.js";
import type { FailureReason, ResultStatus, RetryPolicy } from "./types.js";

type Attemptable = {
	status: ResultStatus;
	reason?: FailureReason;
};

export type RetryOptions<T extends Attemptable> = {
	signal?: AbortSignal;
	onRetry?: (previous: T, nextAttempt: number, delayMs: number) => void;
};

export type RetryOutcome<T> = {
	final: T;
	attempts: T[];
};

// Retrying cannot fix a cancelled run or a credential the store does not have.
const NON_RETRYABLE: ReadonlySet<FailureReason> = new Set(["aborted", "credentials"]);

/**
 * Calls `attempt` until it reports success or unstable, at most
 * `policy.count + 1` times. The last failure is surfaced when every attempt
 * fails.
 */
export async function withRetry<T extends Attemptable>(
	policy: RetryPolicy,
	attempt: (attemptNumber: number) => Promise<T>,
	options: RetryOptions<T> = {},
): Promise<RetryOutcome<T>> {
	const maxAttempts = policy.count + 1;
	const attempts: T[] = [];

	for (let attemptNumber = 1; ; attemptNumber += 1) {
		const result = await attempt(attemptNumber);
		attempts.push(result);

		if (result.status === "success" || result.status === "unstable") {
			return { final: result, attempts };
		}
		if (
			attemptNumber >= maxAttempts ||
			result.status === "aborted" ||
			(result.reason !== undefined && NON_RETRYABLE.has(result.reason)) ||
			options.signal?.aborted
		) {
			return { final: result, attempts };
		}

		const waitMs = backoffFor(policy, attemptNumber);
		options.onRetry?.(result, attemptNumber + 1, waitMs);
		if (waitMs > 0) {
			const completed = await sleep(waitMs, options.signal);
			if (!completed) {
				return { final: result, attempts };
			}
		}
	}
}

export function backoffFor(policy: RetryPolicy, failedAttempt: number): number {
	if (!policy.backoffMs) {
		return 0;
	}
	const factor = policy.factor ?? 1;
	return Math.min(Math.round(policy.backoffMs * factor ** (failedAttempt - 1)), MAX_TIMER_MS);
}

async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	try {
		await delay(ms, undefined, { signal });
		return true;
	} catch (error) {
		if (signal?.aborted) {
			return false;
		}
		throw error;
	}
}
