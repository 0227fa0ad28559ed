import { EventEmitter } from 'events'
import { EngineEvent, EngineEventInput, EngineEventType } from './types'

/**
 * Type-safe event emitter for engine events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class EngineEventEmitter extends EventEmitter {
  /**
   * Emits an engine event with automatic timestamp injection.
   */
  public emitEvent(event: EngineEventInput): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  /**
   * Type-safe event listener registration.
   */
  public onEvent<K extends EngineEventType>(
    eventType: K,
    listener: (event: Extract<EngineEvent, { type: K }>) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: EngineEvent) => void): this {
    return this.on('event', listener)
  }

  public offAnyEvent(listener: (event: EngineEvent) => void): this {
    return this.off('event', listener)
  }

  /**
   * One-time event listener.
   */
  public onceEvent<K extends EngineEventType>(
    eventType: K,
    listener: (event: Extract<EngineEvent, { type: K }>) => void
  ): this {
    return this.once(eventType, listener)
  }

  /**
   * Remove event listener.
   */
  public offEvent<K extends EngineEventType>(
    eventType: K,
    listener: (event: Extract<EngineEvent, { type: K }>) => void
  ): this {
    return this.off(eventType, listener)
  }
}

// Singleton instance for global access
export const engineEvents = new EngineEventEmitter()
