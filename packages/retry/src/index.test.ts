import { expect, test } from 'vitest'

import { TransportError } from '@edgerelay/error'
import { isRetryableError, retry } from './index.js'
import type { RetryContext } from './index.js'

let isError = (error: unknown) => error instanceof Error

test('retries operation successfully', async () => {
	let attempts = 0

	let result = retry({ retry: isError, budget: 3, strategy: 0 }, async () => {
		if (attempts >= 2) {
			return 'success'
		}

		attempts++
		throw new Error('test error')
	})

	await expect(result).resolves.eq('success')
	expect(attempts).eq(2)
})

test('returns result immediately if operation succeeds on first attempt', async () => {
	let attempts = 0

	let result = retry({ retry: isError, budget: 3 }, async () => {
		attempts++
		return 'immediate success'
	})

	await expect(result).resolves.eq('immediate success')
	expect(attempts).eq(1)
})

test('stops when budget is 0', async () => {
	let attempts = 0

	let result = retry({ retry: isError, budget: 0 }, async () => {
		attempts++
		throw new Error('test error')
	})

	await expect(result).rejects.toThrow('test error')
	expect(attempts).eq(0)
})

test('stops when budget exceeded', async () => {
	let attempts = 0

	let result = retry({ retry: isError, budget: 2, strategy: 0 }, async () => {
		attempts++
		throw new Error('test error')
	})

	await expect(result).rejects.toThrow('test error')
	expect(attempts).eq(2)
})

test('accepts aborted signal', async () => {
	let attempts = 0
	let controller = new AbortController()

	controller.abort()

	let result = retry({ retry: isError, signal: controller.signal }, async () => {
		attempts++
		throw new Error('should not reach here')
	})

	await expect(result).rejects.toThrow('This operation was aborted')
	expect(attempts).eq(0)
})

test('expects TimeoutError is not retryable', async () => {
	let attempts = 0
	let timeoutError = new Error('Operation timed out')
	timeoutError.name = 'TimeoutError'

	let result = retry({ retry: isError, budget: 5 }, async () => {
		attempts++
		throw timeoutError
	})

	await expect(result).rejects.toThrow('Operation timed out')
	expect(attempts).eq(1)
})

test('disables retry with false config', async () => {
	let attempts = 0

	let result = retry({ retry: false, budget: 5 }, async () => {
		attempts++
		throw new Error('test error')
	})

	await expect(result).rejects.toThrow('test error')
	expect(attempts).eq(1)
})

test('accepts onRetry callback', async () => {
	let attempts = 0
	let retryCallbacks: { attempt: number; error: string }[] = []

	let onRetry = (ctx: RetryContext) => {
		retryCallbacks.push({ attempt: ctx.attempt, error: ctx.error instanceof Error ? ctx.error.message : '' })
	}

	let result = retry({ retry: isError, budget: 3, strategy: 0, onRetry }, async () => {
		attempts++

		if (attempts < 3) {
			throw new Error(`error ${attempts}`)
		}

		return 'success'
	})

	await expect(result).resolves.eq('success')
	expect(retryCallbacks).toEqual([
		{ attempt: 1, error: 'error 1' },
		{ attempt: 2, error: 'error 2' },
	])
})

test('repeats an unauthorized request exactly once with budget 2', async () => {
	let attempts = 0

	let result = retry({ budget: 2 }, async () => {
		attempts++
		throw new TransportError('unauthorized', 'token rejected', { status: 401 })
	})

	await expect(result).rejects.toThrow('UNAUTHORIZED: token rejected')
	expect(attempts).eq(2)
})

test.each([
	[new TransportError('unauthorized', 'test'), false, true],
	[new TransportError('network', 'test'), false, false],
	[new TransportError('network', 'test'), true, true],
	[new TransportError('status', 'test', { status: 400 }), true, false],
	[new Error('plain'), true, false],
])('isRetryableError(%s, idempotent=%s) is %s', (error, idempotent, expected) => {
	expect(isRetryableError(error, idempotent)).eq(expected)
})

test('retries with the default predicate, budget and backoff', async () => {
	let attempts = 0
	let delays: number[] = []
	let last = Date.now()

	let result = retry({ idempotent: true }, async () => {
		let now = Date.now()
		delays.push(now - last)
		last = now
		attempts++
		throw new TransportError('network', 'connection reset')
	})

	await expect(result).rejects.toThrow('NETWORK_ERROR: connection reset')
	expect(attempts).eq(3)
	expect(delays[1]).toBeGreaterThanOrEqual(15)
	expect(delays[2]).toBeGreaterThanOrEqual(35)
})

test('does not repeat a non-idempotent network failure by default', async () => {
	let attempts = 0

	let result = retry({}, async () => {
		attempts++
		throw new TransportError('network', 'connection reset')
	})

	await expect(result).rejects.toThrow('NETWORK_ERROR: connection reset')
	expect(attempts).eq(1)
})
