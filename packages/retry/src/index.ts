import { setTimeout } from 'node:timers/promises'

import { abortable } from '@edgerelay/abortable'
import { loggers } from '@edgerelay/debug'
import { TransportError } from '@edgerelay/error'

import type { RetryConfig, RetryContext } from './config.js'
import { backoff } from './strategy.js'

export type * from './config.js'
export type { RetryStrategy } from './strategy.js'

let dbg = loggers.retry

export async function retry<R>(
	cfg: RetryConfig,
	fn: (signal: AbortSignal) => R | Promise<R>
): Promise<R> {
	let config: RetryConfig = Object.assign({}, defaultRetryConfig, cfg)
	let ctx: RetryContext = { attempt: 0, error: null }

	let budget: number
	while (
		ctx.attempt <
		(budget =
			typeof config.budget === 'function'
				? config.budget(ctx, config)
				: config.budget ?? Infinity)
	) {
		let ac = new AbortController()
		let signal = cfg.signal
			? AbortSignal.any([cfg.signal, ac.signal])
			: ac.signal

		let start = Date.now()

		try {
			signal.throwIfAborted()
			dbg.log('attempt %d: calling retry function', ctx.attempt + 1)
			// oxlint-disable no-await-in-loop
			let result = await abortable(signal, Promise.resolve(fn(signal)))
			dbg.log('attempt %d: success', ctx.attempt + 1)
			return result
		} catch (error) {
			ctx.attempt += 1
			ctx.error = error

			if (error instanceof Error && error.name === 'AbortError') {
				dbg.log('attempt %d: abort error, not retryable', ctx.attempt)
				throw error
			}

			if (error instanceof Error && error.name === 'TimeoutError') {
				dbg.log('attempt %d: timeout error, not retryable', ctx.attempt)
				throw error
			}

			let retry: boolean
			if (typeof config.retry === 'boolean') {
				retry = config.retry
			} else {
				retry =
					config.retry?.(ctx.error, cfg.idempotent ?? false) ?? false
			}

			if (!retry || ctx.attempt >= budget) {
				dbg.log(
					'attempt %d: not retrying, error: %O',
					ctx.attempt,
					error
				)
				break
			}

			let delay: number
			if (typeof config.strategy === 'number') {
				delay = config.strategy
			} else {
				delay = config.strategy?.(ctx, config) ?? 0
			}

			let remaining = Math.max(delay - (Date.now() - start), 0)
			if (remaining) {
				dbg.log(
					'attempt %d: waiting %d ms before next retry',
					ctx.attempt,
					remaining
				)
				// oxlint-disable no-await-in-loop
				await setTimeout(remaining, void 0, cfg.signal ? { signal: cfg.signal } : {})
			} else {
				dbg.log('attempt %d: no delay before next retry', ctx.attempt)
			}

			config.onRetry?.(ctx)
		} finally {
			ac.abort('Retry cancelled')
		}
	}

	dbg.log(
		'retry failed after %d attempts, last error: %O',
		ctx.attempt,
		ctx.error
	)
	throw ctx.error
}

export function isRetryableError(error: unknown, idempotent = false): boolean {
	if (error instanceof TransportError) {
		return (
			error.retryable === true ||
			(error.retryable === 'conditionally' && idempotent)
		)
	}

	return false
}

/**
 * Used for every option the caller leaves out: transport errors that are safe
 * to repeat, three attempts, backoff from 10 ms up to one second.
 */
export const defaultRetryConfig: RetryConfig = {
	retry: isRetryableError,
	budget: 3,
	strategy: backoff(10, 1000),
}
