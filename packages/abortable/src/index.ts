import { AbortError, TimeoutError } from '@edgerelay/error'

/**
 * Settles with `promise`, or rejects with {@link AbortError} as soon as `signal` aborts.
 * The underlying work is not cancelled, only no longer awaited.
 */
export async function abortable<T>(signal: AbortSignal, promise: Promise<T>): Promise<T> {
	if (signal.aborted) {
		throw new AbortError(signal.reason)
	}

	let abortHandler: (() => void) | undefined

	return Promise.race<T>([
		promise,
		new Promise<never>((_, reject) => {
			abortHandler = () => reject(new AbortError(signal.reason))
			signal.addEventListener('abort', abortHandler, { once: true })
		}),
	])
		.finally(() => {
			if (abortHandler) {
				signal.removeEventListener('abort', abortHandler)
			}
		})
}

/**
 * Settles with `promise`, or rejects with {@link TimeoutError} after `ms`.
 */
export async function deadline<T>(ms: number, promise: Promise<T>): Promise<T> {
	let timer: NodeJS.Timeout | undefined

	return Promise.race<T>([
		promise,
		new Promise<never>((_, reject) => {
			timer = setTimeout(() => reject(new TimeoutError(ms)), ms)
		}),
	])
		.finally(() => {
			clearTimeout(timer)
		})
}
