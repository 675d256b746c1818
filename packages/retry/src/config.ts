import type { Abortable } from "node:events";

import type { RetryStrategy } from "./strategy.js";

/**
 * Context for retry operation
 */
export type RetryContext = {
	attempt: number;
	error: unknown;
}

/**
 * Maximum number of attempts, computed before each attempt
 */
export interface RetryBudget {
	(ctx: RetryContext, cfg: RetryConfig): number
}

/**
 * Options for retry configuration
 */
export interface RetryConfig extends Abortable {
	/** Predicate to determine if an error is retryable */
	retry?: boolean | ((error: RetryContext['error'], idempotent: boolean) => boolean);
	/** Budget for retry attempts */
	budget?: number | RetryBudget;
	/** Strategy to calculate delay */
	strategy?: number | RetryStrategy;
	/** Idempotent operation */
	idempotent?: boolean;
	/** Called before every repeated attempt */
	onRetry?: (ctx: RetryContext) => void;
};
