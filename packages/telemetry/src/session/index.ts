import { setInterval } from 'node:timers/promises'

import { abortable, deadline } from '@edgerelay/abortable'
import { loggers } from '@edgerelay/debug'
import { type Actor, createActor } from 'xstate'

import { type BufferStats, DEFAULT_BUFFER_CAPACITY, EventBuffer } from '../buffer.js'
import { type EventPayload, type SequencedEvent, normalizePayload } from '../event.js'
import {
	DEFAULT_MAX_RECOVERY_DEPTH,
	GapRecoveryCoordinator,
	type RecoveryStats,
	type UnrecoverableGap,
} from '../recovery.js'
import { type PersistenceStats, PersistenceScheduler } from '../scheduler.js'
import { SequenceAllocator } from '../sequence.js'
import { MemoryStore, type PersistenceStore } from '../store.js'
import type { SendOutcome, Transport } from '../transport/types.js'
import { SESSION_STATES, SessionMachine, type SessionState } from './machine.js'

let dbg = loggers.session

export type TelemetrySessionOptions = {
	// Routing key of the device. One session per device.
	deviceKey: string
	// Stamped on every event, e.g. the thermostat manufacturer.
	sourceVendor?: string
	transport: Transport
	// Where the sequence counter and the buffer snapshot are kept.
	// Default is an in-memory store, so nothing survives a restart.
	store?: PersistenceStore
	// Prefix of the persisted keys: `<prefix>:<deviceKey>:sequence` and `<prefix>:<deviceKey>:buffer`.
	// Default is `edgerelay`.
	keyPrefix?: string
	// Number of sent events kept for gap recovery.
	// Default is 200.
	bufferCapacity?: number
	// Maximum number of events in one batch.
	// Default is 50.
	maxBatchSize?: number
	// Interval of the background flush in milliseconds.
	// If not provided, events are only sent by explicit `flush` calls.
	flushIntervalMs?: number
	// Default is 1: gaps reported in response to a resend are not acted on.
	maxRecoveryDepth?: number
	// Upper bound for the final save on close.
	// Default is 5 seconds.
	closeTimeoutMs?: number
	onUnrecoverableGap?: (gap: UnrecoverableGap) => void
}

const defaultOptions = {
	keyPrefix: 'edgerelay',
	bufferCapacity: DEFAULT_BUFFER_CAPACITY,
	maxBatchSize: 50,
	maxRecoveryDepth: DEFAULT_MAX_RECOVERY_DEPTH,
	closeTimeoutMs: 5_000,
} as const satisfies Partial<TelemetrySessionOptions>

export type TelemetrySessionStats = {
	state: SessionState
	deviceKey: string
	lastSequence: number
	pending: number
	// Pending events dropped because the backlog outgrew the buffer.
	dropped: number
	buffer: BufferStats
	recovery: RecoveryStats
	persistence: PersistenceStats
}

/**
 * Sequencing, buffering, sending and gap recovery for one device.
 *
 * Events are sequenced and buffered synchronously by {@link TelemetrySession.publish}
 * and sent in batches by {@link TelemetrySession.flush}. Flushes run one at a time;
 * a failed batch stays pending and is sent again by the next flush.
 */
export class TelemetrySession {
	readonly deviceKey: string
	readonly sourceVendor: string | undefined

	#transport: Transport
	#scheduler: PersistenceScheduler
	#allocator: SequenceAllocator
	#buffer: EventBuffer
	#coordinator: GapRecoveryCoordinator
	#actor: Actor<typeof SessionMachine>

	#maxBatchSize: number
	#flushIntervalMs: number | undefined
	#closeTimeoutMs: number

	#pending: SequencedEvent[] = []
	#dropped = 0
	#lastTimestamp = 0

	#flushing: Promise<SendOutcome | undefined> = Promise.resolve(undefined)
	#flusher: Promise<void> | undefined
	#controller = new AbortController()
	#opened = false
	#ready = false
	#closing: Promise<void> | undefined

	constructor(options: TelemetrySessionOptions) {
		if (!options.deviceKey) {
			throw new TypeError('Device key must not be empty')
		}

		this.deviceKey = options.deviceKey
		this.sourceVendor = options.sourceVendor
		this.#transport = options.transport

		let keyPrefix = options.keyPrefix ?? defaultOptions.keyPrefix
		this.#maxBatchSize = options.maxBatchSize ?? defaultOptions.maxBatchSize
		this.#flushIntervalMs = options.flushIntervalMs
		this.#closeTimeoutMs = options.closeTimeoutMs ?? defaultOptions.closeTimeoutMs

		if (!Number.isSafeInteger(this.#maxBatchSize) || this.#maxBatchSize <= 0) {
			throw new RangeError(`Batch size must be a positive integer, got ${this.#maxBatchSize}`)
		}

		if (this.#flushIntervalMs !== undefined && !(this.#flushIntervalMs > 0)) {
			throw new RangeError(`Flush interval must be positive, got ${this.#flushIntervalMs}`)
		}

		this.#scheduler = new PersistenceScheduler(options.store ?? new MemoryStore())
		this.#allocator = new SequenceAllocator(`${keyPrefix}:${this.deviceKey}:sequence`, this.#scheduler)
		this.#buffer = new EventBuffer(
			`${keyPrefix}:${this.deviceKey}:buffer`,
			this.#scheduler,
			options.bufferCapacity ?? defaultOptions.bufferCapacity
		)
		this.#coordinator = new GapRecoveryCoordinator({
			deviceKey: this.deviceKey,
			buffer: this.#buffer,
			transport: this.#transport,
			maxRecoveryDepth: options.maxRecoveryDepth ?? defaultOptions.maxRecoveryDepth,
			...(options.onUnrecoverableGap && { onUnrecoverableGap: options.onUnrecoverableGap }),
		})

		this.#actor = createActor(SessionMachine, {
			input: { deviceKey: this.deviceKey, dbg: dbg.extend('machine') },
		})
		this.#actor.start()
	}

	get state(): SessionState {
		let snapshot = this.#actor.getSnapshot()
		return SESSION_STATES.find((state) => snapshot.matches(state)) ?? 'closed'
	}

	/**
	 * Restores the counter and the buffer from the store and starts the
	 * background flush. The counter is raised past the newest buffered event,
	 * so a counter snapshot that lags behind the buffer never reissues a sequence.
	 */
	async open(): Promise<void> {
		if (this.#opened) {
			return
		}

		this.#opened = true

		await this.#allocator.restore()
		await this.#buffer.load()
		this.#allocator.advanceTo(this.#buffer.stats().newestSequence ?? 0)
		this.#ready = true

		dbg.log('opened %s at sequence %d, buffer %O', this.deviceKey, this.#allocator.current, this.#buffer.stats())

		if (this.#flushIntervalMs !== undefined && !this.#controller.signal.aborted) {
			this.#flusher = this.#backgroundFlusher(this.#flushIntervalMs, this.#controller.signal)
		}
	}

	/**
	 * Sequences and buffers an event and queues it for the next batch.
	 * Throws before {@link TelemetrySession.open} has completed, after close,
	 * and on a payload with an invalid date; no sequence is used up then.
	 */
	publish(payload: EventPayload, observedAt: Date = new Date()): SequencedEvent {
		if (this.#closing) {
			throw new Error(`Session for ${this.deviceKey} is closed`)
		}

		if (!this.#ready) {
			throw new Error(`Session for ${this.deviceKey} is not open`)
		}

		if (Number.isNaN(observedAt.getTime())) {
			throw new TypeError('Observation time is an invalid date')
		}

		let normalized = normalizePayload(payload)

		// Timestamps never go backwards within a session.
		this.#lastTimestamp = Math.max(this.#lastTimestamp, observedAt.getTime())

		let event: SequencedEvent = {
			...normalized,
			deviceKey: this.deviceKey,
			sequenceNumber: this.#allocator.next(),
			timestamp: new Date(this.#lastTimestamp),
			...(this.sourceVendor !== undefined && { sourceVendor: this.sourceVendor }),
		}

		this.#buffer.add(event)
		this.#pending.push(event)

		if (this.#pending.length > this.#buffer.capacity) {
			let dropped = this.#pending.shift()
			this.#dropped++
			dbg.warn('backlog for %s exceeds the buffer, dropping pending sequence %d', this.deviceKey, dropped?.sequenceNumber)
		}

		return event
	}

	/**
	 * Sends up to `maxBatchSize` pending events and recovers reported gaps.
	 * Resolves with the batch outcome, or `undefined` when nothing was pending.
	 */
	flush(signal?: AbortSignal): Promise<SendOutcome | undefined> {
		if (!this.#ready) {
			return Promise.reject(new Error(`Session for ${this.deviceKey} is not open`))
		}

		let run = this.#flushing.then(() => this.#flushOnce(signal))
		this.#flushing = run.catch((error: unknown) => {
			dbg.warn('flush for %s failed: %O', this.deviceKey, error)
			return undefined
		})

		return run
	}

	/**
	 * Drops the buffered and pending events. The sequence counter keeps going.
	 */
	reset(): void {
		this.#pending = []
		this.#buffer.clear()
		this.#scheduler.schedule(this.#buffer.key, () => this.#buffer.serialize())

		dbg.log('reset %s at sequence %d', this.deviceKey, this.#allocator.current)
	}

	stats(): TelemetrySessionStats {
		return {
			state: this.state,
			deviceKey: this.deviceKey,
			lastSequence: this.#allocator.current,
			pending: this.#pending.length,
			dropped: this.#dropped,
			buffer: this.#buffer.stats(),
			recovery: this.#coordinator.stats(),
			persistence: this.#scheduler.stats,
		}
	}

	/**
	 * Stops sending and writes the counter and the buffer one last time, giving
	 * up after `closeTimeoutMs`. Pending events are not sent; they stay in the
	 * buffer snapshot for gap recovery after a restart.
	 */
	close(signal?: AbortSignal): Promise<void> {
		this.#closing ??= this.#close(signal)
		return this.#closing
	}

	async #close(signal?: AbortSignal): Promise<void> {
		dbg.log('closing %s with %d pending events', this.deviceKey, this.#pending.length)

		this.#controller.abort()
		await this.#flusher
		await this.#flushing
		this.#actor.send({ type: 'session.close' })

		let save = (async () => {
			await this.#scheduler.drain()
			await Promise.all([this.#allocator.save(), this.#buffer.save()])
		})()

		try {
			await deadline(this.#closeTimeoutMs, signal ? abortable(signal, save) : save)
		} catch (error) {
			dbg.warn('final save for %s did not complete: %O', this.deviceKey, error)
		}

		this.#actor.stop()
		dbg.log('closed %s: %O', this.deviceKey, this.stats())
	}

	async #flushOnce(signal?: AbortSignal): Promise<SendOutcome | undefined> {
		// Closing stops new sends; the flush already running is awaited by close.
		if (this.#pending.length === 0 || this.#controller.signal.aborted) {
			return undefined
		}

		let batch = this.#pending.slice(0, this.#maxBatchSize)
		this.#actor.send({ type: 'session.send' })

		let outcome: SendOutcome
		try {
			outcome = await this.#transport.send(batch, signal)
		} catch (error) {
			outcome = { type: 'failed', reason: 'network', error }
		}

		if (outcome.type === 'failed') {
			this.#actor.send({ type: 'session.failed', reason: outcome.reason })
			return outcome
		}

		// Events published during the send were appended after the batch.
		let sent = new Set(batch)
		this.#pending = this.#pending.filter((event) => !sent.has(event))
		this.#actor.send({ type: 'session.delivered', gaps: outcome.gaps.length })

		if (outcome.gaps.length > 0) {
			let result = await this.#coordinator.handleOutcome(outcome, signal)
			dbg.log(
				'recovery for %s: resent %o, unrecoverable %o, failed %o',
				this.deviceKey,
				result.resent,
				result.unrecoverable,
				result.failed
			)
			this.#actor.send({ type: 'session.recovered' })
		}

		return outcome
	}

	async #backgroundFlusher(intervalMs: number, signal: AbortSignal): Promise<void> {
		try {
			for await (let _ of setInterval(intervalMs, void 0, { signal })) {
				await this.flush()
			}
		} catch (error) {
			if (!signal.aborted) {
				dbg.warn('background flush for %s stopped: %O', this.deviceKey, error)
			}
		}
	}
}

/**
 * Creates a session and restores its state from the store.
 */
export async function createTelemetrySession(options: TelemetrySessionOptions): Promise<TelemetrySession> {
	let session = new TelemetrySession(options)
	await session.open()

	return session
}
