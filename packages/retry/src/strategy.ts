import type { RetryConfig, RetryContext } from "./config.js";

/**
 * Strategy to calculate delay.
 * @returns Delay in milliseconds
 */
export interface RetryStrategy {
	(ctx: RetryContext, cfg: RetryConfig): number;
}

/**
 * Doubles the delay on every attempt, starting from `base`, never above `max`.
 */
export function backoff(base: number, max: number): RetryStrategy {
	return (ctx) => Math.min(Math.pow(2, ctx.attempt) * base, max)
}
