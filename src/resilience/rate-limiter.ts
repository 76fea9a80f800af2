import { setTimeout as sleep } from "node:timers/promises";

/**
 * Token bucket used as a throttle: a batch run waits for capacity instead of
 * failing when the bucket is empty.
 */
export class TokenBucketRateLimiter {
	private tokens: number;
	private lastRefill: number;

	constructor(
		private readonly maxTokens: number = 30, // well under the query service's per-minute budget
		private readonly refillIntervalMs: number = 60_000,
	) {
		this.tokens = maxTokens;
		this.lastRefill = Date.now();
	}

	tryConsume(count = 1): boolean {
		this.refill();
		if (this.tokens >= count) {
			this.tokens -= count;
			return true;
		}
		return false;
	}

	/** Resolve once a token has been consumed. */
	async acquire(): Promise<void> {
		while (!this.tryConsume()) {
			await sleep(this.msUntilNextToken());
		}
	}

	msUntilNextToken(): number {
		this.refill();
		if (this.tokens >= 1) return 0;
		const msPerToken = this.refillIntervalMs / this.maxTokens;
		return Math.max(1, Math.ceil((1 - this.tokens) * msPerToken));
	}

	private refill(): void {
		const now = Date.now();
		const elapsed = now - this.lastRefill;
		if (elapsed <= 0) return;
		const tokensToAdd = (elapsed / this.refillIntervalMs) * this.maxTokens;
		this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
		this.lastRefill = now;
	}
}
