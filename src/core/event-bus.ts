/**
 * Typed pub/sub for run events, over a Node EventEmitter.
 *
 * Handlers run synchronously inside emit(), in subscription order, so a
 * progress line is written before the orchestrator moves on.
 */

import { EventEmitter } from 'node:events'
import type { OrchestratorEvents } from './event-bus.types.js'

export type RunEventName = keyof OrchestratorEvents
export type RunEventHandler<K extends RunEventName> = (payload: OrchestratorEvents[K]) => void

/** Detaches the handler it was returned for; calling it twice is harmless */
export type Unsubscribe = () => void

export interface TypedEventBus {
  emit<K extends RunEventName>(event: K, payload: OrchestratorEvents[K]): void
  on<K extends RunEventName>(event: K, handler: RunEventHandler<K>): Unsubscribe
  off<K extends RunEventName>(event: K, handler: RunEventHandler<K>): void
}

export class TypedEventBusImpl implements TypedEventBus {
  // one listener per run event plus the CLI formatters
  private readonly _emitter = new EventEmitter().setMaxListeners(50)

  emit<K extends RunEventName>(event: K, payload: OrchestratorEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends RunEventName>(event: K, handler: RunEventHandler<K>): Unsubscribe {
    this._emitter.on(event, handler)
    return () => this.off(event, handler)
  }

  off<K extends RunEventName>(event: K, handler: RunEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
