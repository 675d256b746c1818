import type { Debugger } from 'debug'
import debug from 'debug'

/**
 * Debug categories used across edgerelay packages
 */
export type EdgeRelayLogCategory =
	| 'auth'
	| 'buffer'
	| 'recovery'
	| 'retry'
	| 'sequence'
	| 'session'
	| 'store'
	| 'transport'

/**
 * Namespaced logger on top of `debug`.
 *
 * Output is off unless the namespace is enabled, e.g. `DEBUG=edgerelay:*`.
 * Conditions the operator should notice go through {@link EdgeRelayDebugLogger.warn},
 * which writes under the `:warn` sub-namespace so they can be enabled alone
 * with `DEBUG=edgerelay:*:warn`.
 */
export class EdgeRelayDebugLogger {
	#namespace: string
	#debuggers = new Map<string, Debugger>()

	constructor(namespace: string) {
		this.#namespace = namespace
	}

	#get(ns: string): Debugger {
		let cachedDebugger = this.#debuggers.get(ns)
		if (!cachedDebugger) {
			cachedDebugger = debug(ns)
			this.#debuggers.set(ns, cachedDebugger)
		}

		return cachedDebugger
	}

	get namespace(): string {
		return this.#namespace
	}

	log(message: unknown, ...args: unknown[]): void {
		this.#get(this.#namespace)(message, ...args)
	}

	warn(message: unknown, ...args: unknown[]): void {
		this.#get(`${this.#namespace}:warn`)(message, ...args)
	}

	get enabled(): boolean {
		return this.#get(this.#namespace).enabled
	}

	extend(subname: string): EdgeRelayDebugLogger {
		return new EdgeRelayDebugLogger(`${this.#namespace}:${subname}`)
	}
}

// Sorted for consistency
export let loggers: Record<EdgeRelayLogCategory, EdgeRelayDebugLogger> = {
	auth: new EdgeRelayDebugLogger('edgerelay:auth'),
	buffer: new EdgeRelayDebugLogger('edgerelay:buffer'),
	recovery: new EdgeRelayDebugLogger('edgerelay:recovery'),
	retry: new EdgeRelayDebugLogger('edgerelay:retry'),
	sequence: new EdgeRelayDebugLogger('edgerelay:sequence'),
	session: new EdgeRelayDebugLogger('edgerelay:session'),
	store: new EdgeRelayDebugLogger('edgerelay:store'),
	transport: new EdgeRelayDebugLogger('edgerelay:transport'),
}
