import { z } from 'zod'

// Thermostat state as observed by the producer at the time of the event.
export type ThermostatReading = {
	currentTemperature: number | null
	targetTemperature: number | null
	targetTempHigh: number | null
	targetTempLow: number | null
	hvacMode: string | null
	hvacStatus: string | null
	fanMode: string | null
	// Air is moving: heating, cooling, or the fan is forced on.
	isActive: boolean
	connected: boolean
}

let ACTIVE_HVAC_STATUSES = new Set(['heating', 'cooling', 'fan'])
let ACTIVE_FAN_MODES = new Set(['on', 'on_high', 'circulate'])

/**
 * Whether the system is moving air: the HVAC is heating, cooling or running the
 * fan, or it is idle with the fan forced on.
 */
export function isAirMoving(hvacStatus: string | null, fanMode: string | null): boolean {
	if (hvacStatus !== null && ACTIVE_HVAC_STATUSES.has(hvacStatus)) {
		return true
	}

	if (hvacStatus !== null && hvacStatus !== 'idle') {
		return false
	}

	return fanMode !== null && ACTIVE_FAN_MODES.has(fanMode.trim().toLowerCase())
}

export type TelemetryPayload = { eventType: 'telemetry' } & ThermostatReading

export type CycleStartPayload = {
	eventType: 'cycle_start'
	cycleStart: Date
} & ThermostatReading

export type CycleEndPayload = {
	eventType: 'cycle_end'
	// Unknown when the agent started in the middle of a cycle.
	cycleStart: Date | null
	cycleEnd: Date
	// Whole seconds; fractions are truncated when the event is published.
	runtimeSeconds: number
} & ThermostatReading

export type ConnectivityPayload = {
	eventType: 'connectivity'
	connected: boolean
	reason: string | null
}

/**
 * What a producer hands over: one variant per event type, without sequencing envelope.
 */
export type EventPayload =
	| TelemetryPayload
	| CycleStartPayload
	| CycleEndPayload
	| ConnectivityPayload

let isValidDate = (date: Date) => !Number.isNaN(date.getTime())

/**
 * Checks the fields of a payload that the wire format cannot carry as given
 * and returns the payload to sequence. Throws on an invalid date or runtime.
 */
export function normalizePayload(payload: EventPayload): EventPayload {
	switch (payload.eventType) {
		case 'telemetry':
		case 'connectivity':
			return payload
		case 'cycle_start':
			if (!isValidDate(payload.cycleStart)) {
				throw new TypeError('Cycle start is an invalid date')
			}

			return payload
		case 'cycle_end':
			if (payload.cycleStart !== null && !isValidDate(payload.cycleStart)) {
				throw new TypeError('Cycle start is an invalid date')
			}

			if (!isValidDate(payload.cycleEnd)) {
				throw new TypeError('Cycle end is an invalid date')
			}

			if (!Number.isFinite(payload.runtimeSeconds) || payload.runtimeSeconds < 0) {
				throw new RangeError(`Runtime must be a non-negative number of seconds, got ${payload.runtimeSeconds}`)
			}

			return { ...payload, runtimeSeconds: Math.trunc(payload.runtimeSeconds) }
	}
}

export type EventEnvelope = {
	deviceKey: string
	// Assigned when the event is buffered, immutable afterwards.
	sequenceNumber: number
	timestamp: Date
	sourceVendor?: string
}

export type SequencedEvent = EventEnvelope & EventPayload

// ============================================================================
// WIRE FORMAT
// ============================================================================

let isoDate = z.string().datetime({ offset: true })

let envelopeShape = {
	device_key: z.string().min(1),
	sequence_number: z.number().int().positive(),
	ts: isoDate,
	source_vendor: z.string().optional(),
}

let readingShape = {
	current_temperature: z.number().nullable(),
	target_temperature: z.number().nullable(),
	target_temp_high: z.number().nullable(),
	target_temp_low: z.number().nullable(),
	hvac_mode: z.string().nullable(),
	hvac_status: z.string().nullable(),
	fan_mode: z.string().nullable(),
	is_active: z.boolean(),
	connected: z.boolean(),
}

/**
 * Snake-case JSON form of a {@link SequencedEvent}, used on the wire and in buffer snapshots.
 */
export const WireEventSchema = z.discriminatedUnion('event_type', [
	z.object({
		...envelopeShape,
		...readingShape,
		event_type: z.literal('telemetry'),
	}),
	z.object({
		...envelopeShape,
		...readingShape,
		event_type: z.literal('cycle_start'),
		cycle_start_ts: isoDate,
	}),
	z.object({
		...envelopeShape,
		...readingShape,
		event_type: z.literal('cycle_end'),
		cycle_start_ts: isoDate.nullable(),
		cycle_end_ts: isoDate,
		runtime_seconds: z.number().int().nonnegative(),
	}),
	z.object({
		...envelopeShape,
		event_type: z.literal('connectivity'),
		connected: z.boolean(),
		reason: z.string().nullable(),
	}),
])

export type WireEvent = z.infer<typeof WireEventSchema>

type WireReading = {
	current_temperature: number | null
	target_temperature: number | null
	target_temp_high: number | null
	target_temp_low: number | null
	hvac_mode: string | null
	hvac_status: string | null
	fan_mode: string | null
	is_active: boolean
	connected: boolean
}

let readingToWire = (reading: ThermostatReading): WireReading => ({
	current_temperature: reading.currentTemperature,
	target_temperature: reading.targetTemperature,
	target_temp_high: reading.targetTempHigh,
	target_temp_low: reading.targetTempLow,
	hvac_mode: reading.hvacMode,
	hvac_status: reading.hvacStatus,
	fan_mode: reading.fanMode,
	is_active: reading.isActive,
	connected: reading.connected,
})

let readingFromWire = (wire: WireReading): ThermostatReading => ({
	currentTemperature: wire.current_temperature,
	targetTemperature: wire.target_temperature,
	targetTempHigh: wire.target_temp_high,
	targetTempLow: wire.target_temp_low,
	hvacMode: wire.hvac_mode,
	hvacStatus: wire.hvac_status,
	fanMode: wire.fan_mode,
	isActive: wire.is_active,
	connected: wire.connected,
})

let envelopeToWire = (event: EventEnvelope) => ({
	device_key: event.deviceKey,
	sequence_number: event.sequenceNumber,
	ts: event.timestamp.toISOString(),
	...(event.sourceVendor !== undefined && { source_vendor: event.sourceVendor }),
})

let envelopeFromWire = (wire: WireEvent): EventEnvelope => ({
	deviceKey: wire.device_key,
	sequenceNumber: wire.sequence_number,
	timestamp: new Date(wire.ts),
	...(wire.source_vendor !== undefined && { sourceVendor: wire.source_vendor }),
})

export function serializeEvent(event: SequencedEvent): WireEvent {
	switch (event.eventType) {
		case 'telemetry':
			return { ...envelopeToWire(event), ...readingToWire(event), event_type: 'telemetry' }
		case 'cycle_start':
			return {
				...envelopeToWire(event),
				...readingToWire(event),
				event_type: 'cycle_start',
				cycle_start_ts: event.cycleStart.toISOString(),
			}
		case 'cycle_end':
			return {
				...envelopeToWire(event),
				...readingToWire(event),
				event_type: 'cycle_end',
				cycle_start_ts: event.cycleStart ? event.cycleStart.toISOString() : null,
				cycle_end_ts: event.cycleEnd.toISOString(),
				runtime_seconds: event.runtimeSeconds,
			}
		case 'connectivity':
			return {
				...envelopeToWire(event),
				event_type: 'connectivity',
				connected: event.connected,
				reason: event.reason,
			}
	}
}

export function deserializeEvent(wire: WireEvent): SequencedEvent {
	switch (wire.event_type) {
		case 'telemetry':
			return { ...envelopeFromWire(wire), ...readingFromWire(wire), eventType: 'telemetry' }
		case 'cycle_start':
			return {
				...envelopeFromWire(wire),
				...readingFromWire(wire),
				eventType: 'cycle_start',
				cycleStart: new Date(wire.cycle_start_ts),
			}
		case 'cycle_end':
			return {
				...envelopeFromWire(wire),
				...readingFromWire(wire),
				eventType: 'cycle_end',
				cycleStart: wire.cycle_start_ts === null ? null : new Date(wire.cycle_start_ts),
				cycleEnd: new Date(wire.cycle_end_ts),
				runtimeSeconds: wire.runtime_seconds,
			}
		case 'connectivity':
			return {
				...envelopeFromWire(wire),
				eventType: 'connectivity',
				connected: wire.connected,
				reason: wire.reason,
			}
	}
}

/**
 * Validates one JSON value as a wire event.
 */
export function parseWireEvent(value: unknown): SequencedEvent | undefined {
	let result = WireEventSchema.safeParse(value)
	return result.success ? deserializeEvent(result.data) : undefined
}
