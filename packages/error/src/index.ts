export type TransportFailureReason =
	| 'aborted'
	| 'network'
	| 'status'
	| 'timeout'
	| 'unauthorized'

export type TransportErrorOptions = {
	status?: number
	body?: string
	cause?: unknown
}

// Longest response excerpt kept on an error, enough to read a server message in logs.
const MAX_BODY_EXCERPT = 500

export class TransportError extends Error {
	override readonly name = 'TransportError'
	readonly reason: TransportFailureReason
	readonly status: number | undefined
	readonly body: string

	constructor(reason: TransportFailureReason, message: string, options: TransportErrorOptions = {}) {
		super(`${TransportError.reasons[reason]}: ${message}`, options.cause === undefined ? undefined : { cause: options.cause })
		this.reason = reason
		this.status = options.status
		this.body = (options.body ?? '').slice(0, MAX_BODY_EXCERPT)
	}

	static reasons: Record<TransportFailureReason, string> = {
		aborted: 'ABORTED',
		network: 'NETWORK_ERROR',
		status: 'BAD_STATUS',
		timeout: 'TIMEOUT',
		unauthorized: 'UNAUTHORIZED',
	} as const

	/**
	 * `true` when repeating the request can succeed as is, `'conditionally'`
	 * when it can only be repeated because the receiving side deduplicates by
	 * sequence number.
	 */
	get retryable(): boolean | 'conditionally' {
		if (this.reason === 'unauthorized') {
			return true
		}

		if (this.reason === 'network' || this.reason === 'timeout') {
			return 'conditionally'
		}

		if (this.reason === 'status' && this.status !== undefined && [429, 502, 503, 504].includes(this.status)) {
			return 'conditionally'
		}

		return false
	}
}

export class AuthError extends Error {
	override readonly name = 'AuthError'

	constructor(message: string, public override cause?: unknown) {
		super(message)
	}
}

export type PersistenceOperation = 'load' | 'save'

export class PersistenceError extends Error {
	override readonly name = 'PersistenceError'

	constructor(
		readonly operation: PersistenceOperation,
		readonly key: string,
		public override cause?: unknown
	) {
		super(`Failed to ${operation} ${key}` + (cause instanceof Error ? `: ${cause.message}` : ''))
	}
}

export class AbortError extends Error {
	override readonly name = 'AbortError'

	constructor(public override cause?: unknown) {
		super('This operation was aborted')
	}
}

export class TimeoutError extends Error {
	override readonly name = 'TimeoutError'

	constructor(readonly timeoutMs: number) {
		super(`Operation timed out after ${timeoutMs}ms`)
	}
}
