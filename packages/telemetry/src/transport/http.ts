import type { CredentialsProvider } from '@edgerelay/auth'
import { AnonymousCredentialsProvider } from '@edgerelay/auth/anonymous'
import { loggers } from '@edgerelay/debug'
import { AuthError, TransportError } from '@edgerelay/error'
import { type RetryConfig, retry } from '@edgerelay/retry'

import { type SequencedEvent, serializeEvent } from '../event.js'
import { parseSendResponse } from './_parse_response.js'
import { isSoftUnauthorized } from './_unauthorized.js'
import type { DeliveredOutcome, FailedOutcome, SendOutcome, Transport } from './types.js'

let dbg = loggers.transport

export type HttpTransportOptions = {
	// Absolute URL the batches are POSTed to.
	endpoint: string
	// Source of the bearer token.
	// Default is anonymous: no Authorization header.
	credentialsProvider?: CredentialsProvider
	// Timeout for one request, including reading the response body.
	// Default is 20 seconds.
	timeoutMs?: number
	// Extra headers sent with every request.
	headers?: Record<string, string>
}

export const DEFAULT_TRANSPORT_TIMEOUT_MS = 20_000

/**
 * Sends event batches as JSON over HTTP and reads gap reports from the response.
 *
 * A rejected token, either as HTTP 401 or as a successful status whose body
 * reports an invalid token, forces a credentials refresh and is retried once.
 */
export class HttpTransport implements Transport {
	#endpoint: string
	#credentialsProvider: CredentialsProvider
	#timeoutMs: number
	#headers: Record<string, string>

	constructor(options: HttpTransportOptions) {
		this.#endpoint = new URL(options.endpoint).toString()
		this.#credentialsProvider = options.credentialsProvider ?? new AnonymousCredentialsProvider()
		this.#timeoutMs = options.timeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS
		this.#headers = options.headers ?? {}

		if (!Number.isFinite(this.#timeoutMs) || this.#timeoutMs <= 0) {
			throw new RangeError(`Transport timeout must be positive, got ${this.#timeoutMs}`)
		}
	}

	get endpoint(): string {
		return this.#endpoint
	}

	async send(events: readonly SequencedEvent[], signal?: AbortSignal): Promise<SendOutcome> {
		if (events.length === 0) {
			throw new RangeError('Cannot send an empty batch')
		}

		let body = JSON.stringify({ events: events.map(serializeEvent) })
		let force = false

		let retryConfig: RetryConfig = {
			retry: (error) => error instanceof TransportError && error.reason === 'unauthorized',
			budget: 2,
			strategy: 0,
			onRetry: () => {
				dbg.log('token rejected, refreshing credentials and retrying')
				force = true
			},
			...(signal && { signal }),
		}

		try {
			let outcome = await retry(retryConfig, (attemptSignal) => this.#post(body, force, attemptSignal))
			dbg.log(
				'delivered %d events (%d..%d), %d gap reports',
				events.length,
				events[0]?.sequenceNumber,
				events[events.length - 1]?.sequenceNumber,
				outcome.gaps.length
			)

			return outcome
		} catch (error) {
			let outcome: FailedOutcome = signal?.aborted
				? { type: 'failed', reason: 'aborted', error }
				: toFailedOutcome(error)
			dbg.warn('sending %d events failed (%s): %O', events.length, outcome.reason, error)

			return outcome
		}
	}

	async #post(body: string, force: boolean, signal: AbortSignal): Promise<DeliveredOutcome> {
		let headers: Record<string, string>
		try {
			headers = await this.#credentialsProvider.authorize(
				{
					...this.#headers,
					'Content-Type': 'application/json',
					Accept: 'application/json',
					'Cache-Control': 'no-cache',
				},
				force,
				signal
			)
		} catch (error) {
			if (error instanceof AuthError) {
				throw error
			}

			throw new AuthError('Failed to obtain an access token', error)
		}

		let timeout = AbortSignal.timeout(this.#timeoutMs)
		let text: string
		let response: Response
		try {
			response = await fetch(this.#endpoint, {
				method: 'POST',
				headers,
				body,
				signal: AbortSignal.any([signal, timeout]),
			})
			text = await response.text()
		} catch (error) {
			if (timeout.aborted) {
				throw new TransportError('timeout', `POST ${this.#endpoint} after ${this.#timeoutMs}ms`, { cause: error })
			}

			if (signal.aborted) {
				throw new TransportError('aborted', `POST ${this.#endpoint}`, { cause: error })
			}

			throw new TransportError('network', `POST ${this.#endpoint}`, { cause: error })
		}

		if (response.status === 401) {
			throw new TransportError('unauthorized', `POST ${this.#endpoint} -> 401`, { status: 401, body: text })
		}

		if (!response.ok) {
			throw new TransportError('status', `POST ${this.#endpoint} -> ${response.status}`, {
				status: response.status,
				body: text,
			})
		}

		if (isSoftUnauthorized(text)) {
			throw new TransportError('unauthorized', `POST ${this.#endpoint} -> ${response.status} with a rejected token`, {
				status: response.status,
				body: text,
			})
		}

		let parsed = parseSendResponse(text)
		if (parsed.warning) {
			dbg.warn('delivered, but part of the response could not be read: %s', parsed.warning)
		}

		return { type: 'delivered', ...parsed }
	}
}

let toFailedOutcome = (error: unknown): FailedOutcome => {
	if (error instanceof TransportError) {
		return { type: 'failed', reason: error.reason, error }
	}

	if (error instanceof AuthError) {
		return { type: 'failed', reason: 'unauthorized', error }
	}

	if (error instanceof Error && error.name === 'AbortError') {
		return { type: 'failed', reason: 'aborted', error }
	}

	return { type: 'failed', reason: 'network', error }
}
