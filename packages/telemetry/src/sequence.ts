import { loggers } from '@edgerelay/debug'
import { PersistenceError } from '@edgerelay/error'

import type { PersistenceScheduler } from './scheduler.js'

let dbg = loggers.sequence

/**
 * Sequence number allocator for one device.
 *
 * Values start at 1 and are strictly increasing across restarts as long as
 * the persisted counter, or the buffer the session advances past, survives.
 * 0 means nothing has been allocated yet.
 */
export class SequenceAllocator {
	#key: string
	#scheduler: PersistenceScheduler
	#last = 0

	constructor(key: string, scheduler: PersistenceScheduler) {
		this.#key = key
		this.#scheduler = scheduler
	}

	get key(): string {
		return this.#key
	}

	/**
	 * Last value handed out.
	 */
	get current(): number {
		return this.#last
	}

	/**
	 * Allocates the next sequence number and schedules the counter for persistence.
	 */
	next(): number {
		let sequence = ++this.#last
		this.#scheduler.schedule(this.#key, () => this.serialize())

		return sequence
	}

	/**
	 * Raises the counter so that the next allocation is greater than `sequence`.
	 */
	advanceTo(sequence: number): void {
		if (sequence <= this.#last) {
			return
		}

		dbg.log('advancing %s from %d to %d', this.#key, this.#last, sequence)
		this.#last = sequence
		this.#scheduler.schedule(this.#key, () => this.serialize())
	}

	/**
	 * Loads the persisted counter. A missing or unreadable value counts as 0.
	 * Never lowers a counter that already advanced in this process.
	 */
	async restore(): Promise<void> {
		let blob: string | undefined
		try {
			blob = await this.#scheduler.store.load(this.#key)
		} catch (error) {
			dbg.warn('%s', new PersistenceError('load', this.#key, error).message)
			return
		}

		let value = parseCounter(blob)
		if (value === undefined) {
			if (blob) {
				dbg.warn('ignoring unreadable counter for %s: %O', this.#key, blob)
			}

			return
		}

		this.#last = Math.max(this.#last, value)
		dbg.log('restored %s at %d', this.#key, this.#last)
	}

	/**
	 * Writes the counter now, bypassing the scheduler.
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

	serialize(): string {
		return String(this.#last)
	}
}

let parseCounter = (blob: string | undefined): number | undefined => {
	if (!blob || !/^\d+$/.test(blob.trim())) {
		return undefined
	}

	let value = Number(blob.trim())
	return Number.isSafeInteger(value) ? value : undefined
}
