/**
 * Lifecycle of a telemetry session as seen from the send path.
 *
 * - `idle`: nothing in flight.
 * - `sending`: a batch is in flight.
 * - `recovering`: the last response reported gaps and resends are in flight.
 * - `degraded`: the last batch failed; its events stay pending for the next flush.
 * - `closed`: no further sends.
 *
 * The machine observes the session; it never starts I/O itself.
 */

import type { TransportFailureReason } from '@edgerelay/error'
import type { EdgeRelayDebugLogger } from '@edgerelay/debug'
import { assign, setup } from 'xstate'

export type SessionInput = {
	deviceKey: string
	dbg: EdgeRelayDebugLogger
}

export type SessionContext = SessionInput & {
	// Consecutive failed batches, reset by the next delivered one.
	failures: number
	lastFailure?: TransportFailureReason
}

export type SessionEvents =
	| { type: 'session.send' }
	| { type: 'session.delivered'; gaps: number }
	| { type: 'session.failed'; reason: TransportFailureReason }
	| { type: 'session.recovered' }
	| { type: 'session.close' }

let log = (message: string) => ({
	type: 'log' as const,
	params: { message },
})

export const SessionMachine = setup({
	types: {
		input: {} as SessionInput,
		context: {} as SessionContext,
		events: {} as SessionEvents,
	},

	actions: {
		log: ({ context, event }, params: { message: string }) => {
			if (!context.dbg.enabled) {
				return
			}

			context.dbg.log('%s [%s] %s (failures=%d)', context.deviceKey, event.type, params.message, context.failures)
		},

		recordFailure: assign(({ context, event }) => {
			if (event.type !== 'session.failed') {
				return {}
			}

			return { failures: context.failures + 1, lastFailure: event.reason }
		}),

		resetFailures: assign({ failures: 0 }),
	},

	guards: {
		hasGaps: ({ event }) => event.type === 'session.delivered' && event.gaps > 0,
	},
}).createMachine({
	id: 'TelemetrySession',
	initial: 'idle',
	context: ({ input }) => ({
		...input,
		failures: 0,
	}),

	on: {
		'session.close': {
			target: '.closed',
			actions: [log('closing session')],
		},
	},

	states: {
		idle: {
			on: {
				'session.send': { target: 'sending' },
			},
		},

		sending: {
			on: {
				'session.delivered': [
					{
						guard: 'hasGaps',
						target: 'recovering',
						actions: ['resetFailures', log('delivered with gaps, recovering')],
					},
					{
						target: 'idle',
						actions: ['resetFailures'],
					},
				],
				'session.failed': {
					target: 'degraded',
					actions: ['recordFailure', log('batch failed, events stay pending')],
				},
			},
		},

		recovering: {
			on: {
				'session.recovered': { target: 'idle', actions: [log('recovery finished')] },
			},
		},

		degraded: {
			on: {
				'session.send': { target: 'sending', actions: [log('retrying pending events')] },
			},
		},

		closed: {
			type: 'final',
		},
	},
})

export const SESSION_STATES = ['idle', 'sending', 'recovering', 'degraded', 'closed'] as const

export type SessionState = (typeof SESSION_STATES)[number]
