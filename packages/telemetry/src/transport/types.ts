import type { TransportFailureReason } from '@edgerelay/error'

import type { SequencedEvent } from '../event.js'

/**
 * The receiving side's claim that it has not seen these sequence numbers for a device.
 */
export type GapReport = {
	deviceKey: string
	sourceVendor?: string
	// Ascending, without duplicates. May be empty.
	missingSequences: number[]
}

export type DeliveredOutcome = {
	type: 'delivered'
	// Empty when the response carried no gap report.
	gaps: GapReport[]
	// Set when the response could not be read; the batch was still accepted.
	warning?: string
}

export type FailedOutcome = {
	type: 'failed'
	reason: TransportFailureReason
	error: unknown
}

export type SendOutcome = DeliveredOutcome | FailedOutcome

export interface Transport {
	/**
	 * Sends a non-empty batch, ordered by sequence number.
	 *
	 * Resolves with a `failed` outcome for every transport-level problem and
	 * rejects only for an empty batch.
	 */
	send(events: readonly SequencedEvent[], signal?: AbortSignal): Promise<SendOutcome>
}
