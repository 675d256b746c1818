import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { loggers } from '@edgerelay/debug'

let dbg = loggers.store

/**
 * Key/blob storage for session snapshots.
 *
 * A `save` replaces the whole blob stored under the key. Implementations
 * must never expose a partially written blob to a later `load`.
 */
export interface PersistenceStore {
	load(key: string): Promise<string | undefined>
	save(key: string, blob: string): Promise<void>
}

export class MemoryStore implements PersistenceStore {
	#data = new Map<string, string>()

	async load(key: string): Promise<string | undefined> {
		return this.#data.get(key)
	}

	async save(key: string, blob: string): Promise<void> {
		this.#data.set(key, blob)
	}

	get size(): number {
		return this.#data.size
	}
}

/**
 * One file per key under `directory`. Saves go to a temporary file that is
 * renamed over the target, so readers see either the old or the new snapshot.
 */
export class FileStore implements PersistenceStore {
	readonly directory: string
	#writes = 0

	constructor(directory: string) {
		this.directory = path.resolve(directory)
	}

	path(key: string): string {
		return path.join(this.directory, `${encodeURIComponent(key)}.json`)
	}

	async load(key: string): Promise<string | undefined> {
		try {
			return await fs.readFile(this.path(key), 'utf8')
		} catch (error) {
			if (isNodeError(error) && error.code === 'ENOENT') {
				dbg.log('no snapshot for %s', key)
				return undefined
			}

			throw error
		}
	}

	async save(key: string, blob: string): Promise<void> {
		let target = this.path(key)
		let temporary = `${target}.${process.pid}.${++this.#writes}.tmp`

		await fs.mkdir(this.directory, { recursive: true })
		try {
			await fs.writeFile(temporary, blob, 'utf8')
			await fs.rename(temporary, target)
		} catch (error) {
			await fs.rm(temporary, { force: true })
			throw error
		}

		dbg.log('saved %s (%d bytes)', key, Buffer.byteLength(blob))
	}
}

let isNodeError = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && 'code' in error
