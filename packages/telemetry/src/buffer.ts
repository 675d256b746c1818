import { z } from 'zod'

import { loggers } from '@edgerelay/debug'
import { PersistenceError } from '@edgerelay/error'

import { type SequencedEvent, parseWireEvent, serializeEvent } from './event.js'
import type { PersistenceScheduler } from './scheduler.js'

let dbg = loggers.buffer

export const DEFAULT_BUFFER_CAPACITY = 200

export type BufferStats = {
	count: number
	capacity: number
	oldestSequence?: number
	newestSequence?: number
}

// Events are validated one by one so a single bad entry does not discard the rest.
let BufferSnapshotSchema = z.object({
	version: z.literal(1),
	events: z.array(z.unknown()),
})

type BufferSnapshot = z.infer<typeof BufferSnapshotSchema>

/**
 * Sliding window of the most recently sent events, ordered by sequence number.
 *
 * Holds at most `capacity` events; adding one more evicts the oldest. Eviction
 * is the only way an event leaves the buffer while the session runs.
 */
export class EventBuffer {
	#key: string
	#capacity: number
	#scheduler: PersistenceScheduler

	// Ascending by sequence number.
	#events: SequencedEvent[] = []
	#index = new Map<number, SequencedEvent>()

	constructor(key: string, scheduler: PersistenceScheduler, capacity = DEFAULT_BUFFER_CAPACITY) {
		if (!Number.isSafeInteger(capacity) || capacity <= 0) {
			throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`)
		}

		this.#key = key
		this.#capacity = capacity
		this.#scheduler = scheduler
	}

	get key(): string {
		return this.#key
	}

	get capacity(): number {
		return this.#capacity
	}

	get size(): number {
		return this.#events.length
	}

	/**
	 * Appends an event and evicts from the head while over capacity.
	 * An event whose sequence number is already resident is ignored.
	 */
	add(event: SequencedEvent): void {
		if (this.#index.has(event.sequenceNumber)) {
			dbg.log('sequence %d already buffered, ignoring', event.sequenceNumber)
			return
		}

		this.#events.push(event)
		this.#index.set(event.sequenceNumber, event)

		while (this.#events.length > this.#capacity) {
			let evicted = this.#events.shift()
			if (evicted) {
				this.#index.delete(evicted.sequenceNumber)
				dbg.log('evicted sequence %d', evicted.sequenceNumber)
			}
		}

		this.#scheduler.schedule(this.#key, () => this.serialize())
	}

	has(sequence: number): boolean {
		return this.#index.has(sequence)
	}

	/**
	 * Resident events whose sequence number is in `sequences`, ascending.
	 * Sequences that are not resident are omitted.
	 */
	getBySequences(sequences: Iterable<number>): SequencedEvent[] {
		let found: SequencedEvent[] = []
		for (let sequence of new Set(sequences)) {
			let event = this.#index.get(sequence)
			if (event) {
				found.push(event)
			}
		}

		return found.sort((a, b) => a.sequenceNumber - b.sequenceNumber)
	}

	stats(): BufferStats {
		let oldest = this.#events[0]
		let newest = this.#events[this.#events.length - 1]

		return {
			count: this.#events.length,
			capacity: this.#capacity,
			...(oldest && { oldestSequence: oldest.sequenceNumber }),
			...(newest && { newestSequence: newest.sequenceNumber }),
		}
	}

	/**
	 * Replaces the in-memory events with the persisted snapshot. Invalid entries
	 * are skipped; on any load failure the current contents are kept.
	 */
	async load(): Promise<void> {
		let blob: string | undefined
		try {
			blob = await this.#scheduler.store.load(this.#key)
		} catch (error) {
			dbg.warn('%s', new PersistenceError('load', this.#key, error).message)
			return
		}

		if (!blob) {
			dbg.log('no snapshot for %s', this.#key)
			return
		}

		let snapshot = parseSnapshot(blob)
		if (!snapshot) {
			dbg.warn('ignoring unreadable snapshot for %s', this.#key)
			return
		}

		let events: SequencedEvent[] = []
		let skipped = 0
		for (let raw of snapshot.events) {
			let event = parseWireEvent(raw)
			if (event) {
				events.push(event)
			} else {
				skipped++
			}
		}

		if (skipped) {
			dbg.warn('skipped %d invalid events in snapshot for %s', skipped, this.#key)
		}

		events.sort((a, b) => a.sequenceNumber - b.sequenceNumber)

		let index = new Map<number, SequencedEvent>()
		let unique: SequencedEvent[] = []
		for (let event of events) {
			if (!index.has(event.sequenceNumber)) {
				index.set(event.sequenceNumber, event)
				unique.push(event)
			}
		}

		let kept = unique.slice(-this.#capacity)
		for (let event of unique.slice(0, unique.length - kept.length)) {
			index.delete(event.sequenceNumber)
		}

		this.#events = kept
		this.#index = index

		dbg.log('loaded %s: %O', this.#key, this.stats())
	}

	/**
	 * Writes the full snapshot now, bypassing the scheduler.
	 */
	async save(): Promise<boolean> {
		try {
			await this.#scheduler.store.save(this.#key, this.serialize())
			return true
		} catch (error) {
			dbg.warn('%s', new PersistenceError('save', this.#key, error).message)
			return false
		}
	}

	clear(): void {
		this.#events = []
		this.#index.clear()
	}

	serialize(): string {
		let snapshot: BufferSnapshot = {
			version: 1,
			events: this.#events.map(serializeEvent),
		}

		return JSON.stringify(snapshot)
	}

	*[Symbol.iterator](): IterableIterator<SequencedEvent> {
		yield* this.#events
	}
}

let parseSnapshot = (blob: string): BufferSnapshot | undefined => {
	let value: unknown
	try {
		value = JSON.parse(blob)
	} catch {
		return undefined
	}

	let result = BufferSnapshotSchema.safeParse(value)
	return result.success ? result.data : undefined
}
