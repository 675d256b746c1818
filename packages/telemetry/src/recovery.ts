import { loggers } from '@edgerelay/debug'

import type { BufferStats, EventBuffer } from './buffer.js'
import type { GapReport, SendOutcome, Transport } from './transport/types.js'

let dbg = loggers.recovery

/**
 * Reported missing sequences that are no longer in the buffer.
 * The receiving side owns the bookkeeping of permanent loss; this is a diagnostic.
 */
export type UnrecoverableGap = {
	deviceKey: string
	sourceVendor?: string
	sequences: number[]
	buffer: BufferStats
}

export type RecoveryResult = {
	// Sequences resent and accepted.
	resent: number[]
	// Sequences not resident in the buffer.
	unrecoverable: number[]
	// Sequences whose resend failed. Not retried in this cycle.
	failed: number[]
	// Gap reports past the recovery depth, left for a later response.
	deferred: GapReport[]
	// Gap reports for other devices.
	skipped: GapReport[]
}

export type RecoveryStats = {
	cycles: number
	resent: number
	unrecoverable: number
	failed: number
}

export type GapRecoveryOptions = {
	deviceKey: string
	buffer: EventBuffer
	transport: Transport
	// How many generations of gap reports one outcome may trigger. A resend's
	// own gap reports belong to the next generation.
	// Default is 1.
	maxRecoveryDepth?: number
	onUnrecoverableGap?: (gap: UnrecoverableGap) => void
}

export const DEFAULT_MAX_RECOVERY_DEPTH = 1

/**
 * Resolves gap reports against the buffer and resends what it still holds.
 *
 * Each sequence is resent at most once per outcome, a failed resend is not
 * retried, and buffered events are never removed or changed.
 */
export class GapRecoveryCoordinator {
	#deviceKey: string
	#buffer: EventBuffer
	#transport: Transport
	#maxRecoveryDepth: number
	#onUnrecoverableGap: ((gap: UnrecoverableGap) => void) | undefined

	#stats: RecoveryStats = { cycles: 0, resent: 0, unrecoverable: 0, failed: 0 }

	constructor(options: GapRecoveryOptions) {
		this.#deviceKey = options.deviceKey
		this.#buffer = options.buffer
		this.#transport = options.transport
		this.#maxRecoveryDepth = options.maxRecoveryDepth ?? DEFAULT_MAX_RECOVERY_DEPTH
		this.#onUnrecoverableGap = options.onUnrecoverableGap

		if (!Number.isSafeInteger(this.#maxRecoveryDepth) || this.#maxRecoveryDepth < 0) {
			throw new RangeError(`Recovery depth must be a non-negative integer, got ${this.#maxRecoveryDepth}`)
		}
	}

	stats(): RecoveryStats {
		return { ...this.#stats }
	}

	async handleOutcome(outcome: SendOutcome, signal?: AbortSignal): Promise<RecoveryResult> {
		let result: RecoveryResult = { resent: [], unrecoverable: [], failed: [], deferred: [], skipped: [] }
		if (outcome.type !== 'delivered' || outcome.gaps.length === 0) {
			return result
		}

		this.#stats.cycles++

		let attempted = new Set<number>()
		let generation = outcome.gaps

		for (let depth = 0; generation.length > 0; depth++) {
			if (depth >= this.#maxRecoveryDepth) {
				dbg.log('deferring %d gap reports at depth %d', generation.length, depth)
				result.deferred.push(...generation)
				break
			}

			let next: GapReport[] = []
			for (let report of generation) {
				if (report.deviceKey !== this.#deviceKey) {
					dbg.log('skipping gap report for %s', report.deviceKey)
					result.skipped.push(report)
					continue
				}

				if (report.missingSequences.length === 0) {
					continue
				}

				// oxlint-disable no-await-in-loop
				let gaps = await this.#recover(report, attempted, result, signal)
				next.push(...gaps)
			}

			generation = next
		}

		return result
	}

	async #recover(
		report: GapReport,
		attempted: Set<number>,
		result: RecoveryResult,
		signal?: AbortSignal
	): Promise<GapReport[]> {
		dbg.log('gap reported for %s: %o, buffer %O', report.deviceKey, report.missingSequences, this.#buffer.stats())

		let lost = report.missingSequences.filter((sequence) => !this.#buffer.has(sequence) && !attempted.has(sequence))
		if (lost.length > 0) {
			for (let sequence of lost) {
				attempted.add(sequence)
			}

			this.#reportUnrecoverable(report, lost)
			result.unrecoverable.push(...lost)
		}

		let events = this.#buffer.getBySequences(report.missingSequences).filter((event) => !attempted.has(event.sequenceNumber))
		if (events.length === 0) {
			return []
		}

		let sequences = events.map((event) => event.sequenceNumber)
		for (let sequence of sequences) {
			attempted.add(sequence)
		}

		let outcome: SendOutcome
		try {
			outcome = await this.#transport.send(events, signal)
		} catch (error) {
			outcome = { type: 'failed', reason: 'network', error }
		}

		if (outcome.type === 'failed') {
			this.#stats.failed += sequences.length
			result.failed.push(...sequences)
			dbg.warn('resend of %o for %s failed (%s), leaving it to the next batch', sequences, this.#deviceKey, outcome.reason)

			return []
		}

		this.#stats.resent += sequences.length
		result.resent.push(...sequences)
		dbg.log('resent %o for %s', sequences, this.#deviceKey)

		return outcome.gaps
	}

	#reportUnrecoverable(report: GapReport, sequences: number[]): void {
		let gap: UnrecoverableGap = {
			deviceKey: report.deviceKey,
			...(report.sourceVendor !== undefined && { sourceVendor: report.sourceVendor }),
			sequences,
			buffer: this.#buffer.stats(),
		}

		this.#stats.unrecoverable += sequences.length
		dbg.warn('unrecoverable gap for %s: %o not in buffer %O', gap.deviceKey, sequences, gap.buffer)

		try {
			this.#onUnrecoverableGap?.(gap)
		} catch (error) {
			dbg.warn('unrecoverable gap callback failed: %O', error)
		}
	}
}
