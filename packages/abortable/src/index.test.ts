import { expect, test, vi } from 'vitest'

import { AbortError, TimeoutError } from '@edgerelay/error'
import { abortable, deadline } from './index.js'

test('resolves when promise resolves before abort', async () => {
	let controller = new AbortController()

	let result = abortable(controller.signal, Promise.resolve('success'))

	await expect(result).resolves.eq('success')
})

test('rejects when promise rejects before abort', async () => {
	let controller = new AbortController()

	let result = abortable(controller.signal, Promise.reject(new Error('promise error')))

	await expect(result).rejects.toThrow('promise error')
})

test('throws immediately when signal already aborted', async () => {
	let controller = new AbortController()
	let reason = new Error('session closed')
	controller.abort(reason)

	let result = abortable(controller.signal, Promise.resolve('success'))

	await expect(result).rejects.toBeInstanceOf(AbortError)
	await expect(result).rejects.toMatchObject({ cause: reason })
})

test('aborts when signal aborted while waiting', async () => {
	let controller = new AbortController()
	let promise = new Promise((resolve) => {
		setTimeout(() => resolve('success'), 100)
	})

	let result = abortable(controller.signal, promise)
	setTimeout(() => controller.abort(), 10)

	await expect(result).rejects.toThrow('This operation was aborted')
})

test('removes the abort listener once settled', async () => {
	let controller = new AbortController()
	let removeSpy = vi.spyOn(controller.signal, 'removeEventListener')

	await abortable(controller.signal, Promise.resolve(1))

	expect(removeSpy).toHaveBeenCalledOnce()
})

test('deadline resolves a promise that settles in time', async () => {
	await expect(deadline(100, Promise.resolve('saved'))).resolves.eq('saved')
})

test('deadline rejects a promise that outlives it', async () => {
	vi.useFakeTimers()
	try {
		let result = deadline(50, new Promise(() => {}))
		let assertion = expect(result).rejects.toBeInstanceOf(TimeoutError)

		await vi.advanceTimersByTimeAsync(50)
		await assertion
	} finally {
		vi.useRealTimers()
	}
})
