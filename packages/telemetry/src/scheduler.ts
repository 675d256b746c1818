import { loggers } from '@edgerelay/debug'
import { PersistenceError } from '@edgerelay/error'

import type { PersistenceStore } from './store.js'

let dbg = loggers.store.extend('scheduler')

export type PersistenceStats = {
	// Snapshots requested through `schedule`.
	scheduled: number
	// Snapshots written to the store.
	written: number
	// Writes the store rejected.
	failed: number
	// Keys with a write in flight.
	inflight: number
}

/**
 * Background writer for snapshots.
 *
 * `schedule` returns immediately. Per key at most one write is in flight and
 * at most one more is queued; a newer request replaces the queued one, and the
 * snapshot is produced only when its write starts, so it is always the latest
 * state. Failures are logged and counted, never thrown.
 */
export class PersistenceScheduler {
	#store: PersistenceStore
	#queued = new Map<string, () => string>()
	#inflight = new Map<string, Promise<void>>()

	#scheduled = 0
	#written = 0
	#failed = 0

	constructor(store: PersistenceStore) {
		this.#store = store
	}

	get store(): PersistenceStore {
		return this.#store
	}

	schedule(key: string, snapshot: () => string): void {
		this.#scheduled++
		this.#queued.set(key, snapshot)

		if (!this.#inflight.has(key)) {
			this.#run(key)
		}
	}

	/**
	 * Resolves once every scheduled snapshot has been written or has failed.
	 */
	async drain(): Promise<void> {
		while (this.#inflight.size > 0) {
			// oxlint-disable no-await-in-loop
			await Promise.all(this.#inflight.values())
		}
	}

	get stats(): PersistenceStats {
		return {
			scheduled: this.#scheduled,
			written: this.#written,
			failed: this.#failed,
			inflight: this.#inflight.size,
		}
	}

	#run(key: string): void {
		let task = (async () => {
			let snapshot: (() => string) | undefined
			while ((snapshot = this.#queued.get(key))) {
				this.#queued.delete(key)

				try {
					// oxlint-disable no-await-in-loop
					await this.#store.save(key, snapshot())
					this.#written++
				} catch (error) {
					this.#failed++
					dbg.warn('%s', new PersistenceError('save', key, error).message)
				}
			}
		})().finally(() => {
			this.#inflight.delete(key)
			// A request that arrived after the loop ended but before this cleanup.
			if (this.#queued.has(key)) {
				this.#run(key)
			}
		})

		this.#inflight.set(key, task)
	}
}
