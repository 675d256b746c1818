export * from './event.js'
export * from './store.js'
export * from './scheduler.js'
export * from './sequence.js'
export * from './buffer.js'
export * from './recovery.js'
export type * from './transport/types.js'
export * from './transport/http.js'
export * from './session/index.js'
export { SessionMachine, SESSION_STATES, type SessionState } from './session/machine.js'
