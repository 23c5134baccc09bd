/**
 * TypedEventBus — typed internal pub/sub for progress reporting.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - EventBus cannot depend on any module.
 */

import { EventEmitter } from 'node:events'
import type { HookstageEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `HookstageEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof HookstageEvents>(event: K, payload: HookstageEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof HookstageEvents>(
    event: K,
    handler: (payload: HookstageEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof HookstageEvents>(
    event: K,
    handler: (payload: HookstageEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('hook:ready', ({ phase, hook }) => {
 *   console.log(`${phase}: ${hook.kind}/${hook.name} ready`)
 * })
 * bus.emit('hook:ready', { phase: 'pre-install', hook: { kind: 'Job', name: 'migrate' }, durationMs: 1200 })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(50)
  }

  emit<K extends keyof HookstageEvents>(event: K, payload: HookstageEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof HookstageEvents>(
    event: K,
    handler: (payload: HookstageEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof HookstageEvents>(
    event: K,
    handler: (payload: HookstageEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
