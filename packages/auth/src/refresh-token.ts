import { z } from 'zod'

import { loggers } from '@edgerelay/debug'
import { AuthError, TransportError } from '@edgerelay/error'
import { type RetryConfig, retry } from '@edgerelay/retry'

import { CredentialsProvider } from './index.js'

let dbg = loggers.auth.extend('refresh')

export type RefreshTokenCredentials = {
	accessToken: string
	refreshToken?: string
	// Unix time in seconds. Without it the access token is treated as long-lived.
	expiresAt?: number
}

export type RefreshTokenOptions = {
	// Absolute URL of the endpoint that exchanges a refresh token for a new access token.
	endpoint: string
	// Refresh this many seconds before the access token expires.
	// Default is 60 seconds.
	skewSeconds?: number
	// Timeout for a single refresh request.
	// Default is 20 seconds.
	timeoutMs?: number
	// Called with the new credentials after every successful refresh, so the host can persist them.
	onRefresh?: (credentials: RefreshTokenCredentials) => void
}

// The refresh endpoint may wrap its payload in `response`.
let RefreshResponseBodySchema = z.object({
	access_token: z.string().min(1),
	expires_at: z.coerce.number().int(),
	refresh_token: z.string().min(1).optional(),
})

let RefreshResponseSchema = z.union([
	z.object({ response: RefreshResponseBodySchema }).transform((data) => data.response),
	RefreshResponseBodySchema,
])

/**
 * A credentials provider that keeps an access token fresh with a refresh token.
 *
 * The token is refreshed lazily: when it is about to expire, or when the caller
 * forces it after the server rejected the current one. Concurrent callers share
 * a single refresh request.
 */
export class RefreshTokenCredentialsProvider extends CredentialsProvider {
	#credentials: RefreshTokenCredentials
	#endpoint: string
	#skewSeconds: number
	#timeoutMs: number
	#onRefresh: ((credentials: RefreshTokenCredentials) => void) | undefined
	#promise: Promise<string> | null = null

	constructor(credentials: RefreshTokenCredentials, options: RefreshTokenOptions) {
		super()
		this.#credentials = { ...credentials }
		this.#endpoint = new URL(options.endpoint).toString()
		this.#skewSeconds = options.skewSeconds ?? 60
		this.#timeoutMs = options.timeoutMs ?? 20_000
		this.#onRefresh = options.onRefresh

		dbg.log('creating refresh token credentials provider with endpoint: %s', this.#endpoint)
	}

	get credentials(): Readonly<RefreshTokenCredentials> {
		return this.#credentials
	}

	async getToken(force = false, signal?: AbortSignal): Promise<string> {
		let { expiresAt } = this.#credentials
		if (!force && (expiresAt === undefined || Date.now() / 1000 < expiresAt - this.#skewSeconds)) {
			return this.#credentials.accessToken
		}

		if (this.#promise) {
			dbg.log('refresh already in progress, waiting for result')
			return this.#promise
		}

		let refreshToken = this.#credentials.refreshToken
		if (!refreshToken) {
			dbg.warn('no refresh token, keeping the current access token')
			return this.#credentials.accessToken
		}

		let retryConfig: RetryConfig = {
			idempotent: true,
			onRetry: (ctx) => {
				dbg.log('retrying token refresh, attempt %d, error: %O', ctx.attempt, ctx.error)
			},
			...(signal && { signal }),
		}

		this.#promise = retry(retryConfig, (signal) => this.#refresh(refreshToken, signal))
			.catch((error: unknown) => {
				dbg.warn('token refresh failed: %O', error)
				throw new AuthError('Token refresh failed', error)
			})
			.finally(() => {
				this.#promise = null
			})

		return this.#promise
	}

	async #refresh(refreshToken: string, signal: AbortSignal): Promise<string> {
		dbg.log('refreshing access token at %s', this.#endpoint)

		let response: Response
		try {
			response = await fetch(this.#endpoint, {
				method: 'POST',
				headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
				body: JSON.stringify({ refresh_token: refreshToken }),
				signal: AbortSignal.any([signal, AbortSignal.timeout(this.#timeoutMs)]),
			})
		} catch (error) {
			if (error instanceof Error && error.name === 'TimeoutError') {
				throw new TransportError('timeout', `POST ${this.#endpoint}`, { cause: error })
			}

			if (error instanceof Error && error.name === 'AbortError') {
				throw error
			}

			throw new TransportError('network', `POST ${this.#endpoint}`, { cause: error })
		}

		let text = await response.text()
		if (!response.ok) {
			throw new TransportError('status', `POST ${this.#endpoint} -> ${response.status}`, {
				status: response.status,
				body: text,
			})
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(text)
		} catch (error) {
			throw new AuthError('Refresh response is not JSON', error)
		}

		let result = RefreshResponseSchema.safeParse(parsed)
		if (!result.success) {
			throw new AuthError('Refresh response is missing access_token or expires_at', result.error)
		}

		let body = result.data
		this.#credentials = {
			accessToken: body.access_token,
			refreshToken: body.refresh_token ?? refreshToken,
			expiresAt: body.expires_at,
		}

		dbg.log('token refreshed, expires at %d', body.expires_at)
		this.#onRefresh?.({ ...this.#credentials })

		return body.access_token
	}
}
