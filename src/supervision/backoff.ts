/**
 * BACKOFF POLICIES
 * ================
 *
 * Decide how long to wait before restarting a process that exited,
 * or that it should not be restarted at all.
 *
 * A policy instance is stateful and lives for one supervision: attempt
 * counters persist across restarts of the same child until supervision ends.
 */

export type BackoffDecision =
	| { kind: 'wait'; delayMs: number }
	| { kind: 'give-up'; reason: string };

export interface BackoffPolicy {
	next(): BackoffDecision;
}

export type BackoffFactory = () => BackoffPolicy;

export const DEFAULT_BACKOFF_DELAY_MS = 1000;

/** Retries older than this are considered unrelated and reset the attempt counter */
export const DEFAULT_RESET_AFTER_MS = 30 * 1000;

export interface CountingBackoffOptions {
	/** Base delay between restarts */
	delayMs?: number;
	/** 0 means unlimited */
	maxRetries?: number;
	resetAfterMs?: number;
	/** Injectable clock for tests */
	now?: () => number;
}

/**
 * Shared bookkeeping for policies whose delay depends on the attempt number
 */
export abstract class CountingBackoff implements BackoffPolicy {
	protected readonly delayMs: number;
	private readonly maxRetries: number;
	private readonly resetAfterMs: number;
	private readonly now: () => number;
	private tries = 0;
	private lastRetry: number;

	constructor(options: CountingBackoffOptions = {}) {
		this.delayMs = options.delayMs ?? DEFAULT_BACKOFF_DELAY_MS;
		this.maxRetries = options.maxRetries ?? 0;
		this.resetAfterMs = options.resetAfterMs ?? DEFAULT_RESET_AFTER_MS;
		this.now = options.now ?? Date.now;
		this.lastRetry = this.now();
	}

	public next(): BackoffDecision {
		const now = this.now();
		if (now - this.lastRetry > this.resetAfterMs) {
			this.tries = 0;
		}

		if (this.maxRetries > 0 && this.tries >= this.maxRetries) {
			return { kind: 'give-up', reason: `max retries (${this.maxRetries}) reached` };
		}

		const delayMs = this.delayFor(this.tries);
		this.tries++;
		this.lastRetry = now;

		return { kind: 'wait', delayMs };
	}

	public attempts(): number {
		return this.tries;
	}

	/**
	 * Delay for the given zero-based attempt
	 */
	protected abstract delayFor(attempt: number): number;
}

export class FixedBackoff extends CountingBackoff {
	protected delayFor(): number {
		return this.delayMs;
	}
}

export class LinearBackoff extends CountingBackoff {
	protected delayFor(attempt: number): number {
		return this.delayMs * (attempt + 1);
	}
}

export interface ExponentialBackoffOptions extends CountingBackoffOptions {
	/** Upper bound for a single delay */
	maxDelayMs?: number;
	/** Fraction (0..1) of the delay randomly removed */
	jitter?: number;
	random?: () => number;
}

export class ExponentialBackoff extends CountingBackoff {
	private readonly maxDelayMs: number;
	private readonly jitter: number;
	private readonly random: () => number;

	constructor(options: ExponentialBackoffOptions = {}) {
		super(options);
		this.maxDelayMs = options.maxDelayMs ?? 5 * 60 * 1000; // 5m, like image pull backoff
		this.jitter = Math.min(Math.max(options.jitter ?? 0, 0), 1);
		this.random = options.random ?? Math.random;
	}

	protected delayFor(attempt: number): number {
		const delay = Math.min(this.delayMs * 2 ** attempt, this.maxDelayMs);
		return Math.round(delay * (1 - this.jitter * this.random()));
	}
}

/**
 * Adapt a plain function. Returning `null` gives up.
 */
export function backoffFromFunction(fn: () => number | null): BackoffPolicy {
	return {
		next: () => {
			const delayMs = fn();
			return delayMs === null
				? { kind: 'give-up', reason: 'backoff function gave up' }
				: { kind: 'wait', delayMs };
		},
	};
}

export type BackoffType = 'fixed' | 'linear' | 'exponential';

export interface BackoffConfig {
	type: BackoffType;
	delayMs?: number;
	maxRetries?: number;
	resetAfterMs?: number;
	maxDelayMs?: number;
	jitter?: number;
}

/**
 * Build a factory producing a fresh policy for every supervision
 */
export function createBackoffFactory(config: BackoffConfig = { type: 'fixed' }): BackoffFactory {
	const { type, ...options } = config;
	switch (type) {
		case 'fixed':
			return () => new FixedBackoff(options);
		case 'linear':
			return () => new LinearBackoff(options);
		case 'exponential':
			return () => new ExponentialBackoff(options);
	}
}
