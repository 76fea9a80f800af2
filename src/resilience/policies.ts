import {
	ConsecutiveBreaker,
	ExponentialBackoff,
	TimeoutStrategy,
	circuitBreaker,
	handleType,
	retry,
	timeout,
	wrap,
} from "cockatiel";
import { logger } from "../logger.js";

// Custom error types for response classification
export class RateLimitError extends Error {
	constructor(public retryAfterMs: number) {
		super(`Rate limited. Retry after ${retryAfterMs}ms`);
		this.name = "RateLimitError";
	}
}

export class ApiError extends Error {
	constructor(
		public statusCode: number,
		message: string,
	) {
		super(message);
		this.name = "ApiError";
	}
}

// Only handle 5xx server errors -- NOT RateLimitError, NOT 4xx
const serverErrorPolicy = handleType(ApiError, (err) => err.statusCode >= 500);

// Query service: open after 5 consecutive 5xx failures, half-open after 60s
export const queryServiceBreaker = circuitBreaker(serverErrorPolicy, {
	halfOpenAfter: 60_000,
	breaker: new ConsecutiveBreaker(5),
});

// WDQS cancels queries at 60s on its side
const queryTimeout = timeout(65_000, TimeoutStrategy.Aggressive);

// Retry: up to 2 retries with exponential backoff (only on 5xx, not 429)
const queryRetry = retry(serverErrorPolicy, {
	maxAttempts: 2,
	backoff: new ExponentialBackoff({
		initialDelay: 1_000,
		maxDelay: 10_000,
	}),
});

// Compose: outer retry -> circuit breaker -> inner timeout
export const queryServicePolicy = wrap(queryRetry, queryServiceBreaker, queryTimeout);

// Decision PDF downloads
export const documentPolicy = timeout(120_000, TimeoutStrategy.Aggressive);

// Edits: timeout only, no retry
export const editPolicy = timeout(30_000, TimeoutStrategy.Aggressive);

queryServiceBreaker.onBreak(() => {
	logger.error("[CIRCUIT] Query service circuit breaker OPENED");
});
queryServiceBreaker.onReset(() => {
	logger.info("[CIRCUIT] Query service circuit breaker CLOSED");
});
queryServiceBreaker.onHalfOpen(() => {
	logger.info("[CIRCUIT] Query service circuit breaker HALF-OPEN");
});
