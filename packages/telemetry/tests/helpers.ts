import { z } from 'zod'

import { type CycleEndPayload, type EventPayload, WireEventSchema } from '../src/index.js'

let RequestSchema = z.object({ events: z.array(WireEventSchema) })

/**
 * In-process stand-in for the ingestion service, reachable through a stubbed `fetch`.
 *
 * Tracks the sequences it has seen per device and answers every batch with
 * the gaps below the highest sequence seen.
 */
export class FakeIngestion {
	received = new Map<string, Set<number>>()
	// Sequence numbers of every accepted request, in arrival order.
	requests: number[][] = []
	// Sequences dropped on arrival, once each.
	lose = new Set<number>()
	// Number of upcoming requests answered with 503.
	failures = 0
	// When set, other tokens get a successful status with a rejected token in the body.
	acceptToken: string | undefined

	fetch = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
		if (this.failures > 0) {
			this.failures--
			return new Response('unavailable', { status: 503 })
		}

		let authorization = new Headers(init?.headers).get('Authorization')
		if (this.acceptToken !== undefined && authorization !== `Bearer ${this.acceptToken}`) {
			return Response.json({ response: { status: 401, message: 'Invalid access token' } })
		}

		let { events } = RequestSchema.parse(JSON.parse(String(init?.body)))
		this.requests.push(events.map((event) => event.sequence_number))

		for (let event of events) {
			if (this.lose.delete(event.sequence_number)) {
				continue
			}

			let seen = this.received.get(event.device_key) ?? new Set<number>()
			seen.add(event.sequence_number)
			this.received.set(event.device_key, seen)
		}

		let gaps = [...this.received].flatMap(([deviceKey, seen]) => {
			let missing: number[] = []
			for (let sequence = 1; sequence < Math.max(...seen); sequence++) {
				if (!seen.has(sequence)) {
					missing.push(sequence)
				}
			}

			return missing.length > 0
				? [{ device_key: deviceKey, source_vendor: 'acme', missing_sequences: missing }]
				: []
		})

		return Response.json(gaps.length > 0 ? { gaps } : {})
	}

	sequences(deviceKey: string): number[] {
		return [...(this.received.get(deviceKey) ?? [])].sort((a, b) => a - b)
	}
}

export function reading(temperature: number): EventPayload {
	return {
		eventType: 'telemetry',
		currentTemperature: temperature,
		targetTemperature: 21,
		targetTempHigh: null,
		targetTempLow: null,
		hvacMode: 'heat',
		hvacStatus: 'idle',
		fanMode: 'auto',
		isActive: false,
		connected: true,
	}
}

export function cycleEnd(runtimeSeconds: number, end: Date = new Date(60_000)): CycleEndPayload {
	return {
		eventType: 'cycle_end',
		cycleStart: new Date(0),
		cycleEnd: end,
		runtimeSeconds,
		currentTemperature: 21,
		targetTemperature: 21,
		targetTempHigh: null,
		targetTempLow: null,
		hvacMode: 'heat',
		hvacStatus: 'idle',
		fanMode: 'auto',
		isActive: false,
		connected: true,
	}
}
