import { EventEmitter } from 'events';

import { type DriverLogger, isLoggableEvent, type LoggableComponent } from './logger';

/** @public */
export type GenericListener = (...args: any[]) => void;

/** Maps each event name of an emitter to its listener signature */
export type EventsDescription = Record<string, GenericListener>;

/**
 * Event emitter whose listener and emit signatures come from `Events`. Names outside `Events`
 * fall back to the untyped `EventEmitter` signatures.
 * @public
 */
export declare interface TypedEventEmitter<Events extends EventsDescription> extends EventEmitter {
  on<K extends keyof Events>(event: K, listener: Events[K]): this;
  on(event: string | symbol, listener: GenericListener): this;
  once<K extends keyof Events>(event: K, listener: Events[K]): this;
  once(event: string | symbol, listener: GenericListener): this;
  off<K extends keyof Events>(event: K, listener: Events[K]): this;
  off(event: string | symbol, listener: GenericListener): this;
  emit<K extends keyof Events>(event: K | symbol, ...args: Parameters<Events[K]>): boolean;
}

/**
 * When a logger and a component are attached, events published through `emitAndLog` are also
 * written at debug severity.
 * @public
 */
export class TypedEventEmitter<Events extends EventsDescription> extends EventEmitter {
  /** @internal */
  logger?: DriverLogger;
  /** @internal */
  protected component?: LoggableComponent;

  /** @internal */
  emitAndLog<K extends keyof Events>(event: K | symbol, ...args: Parameters<Events[K]>): void {
    this.emit(event, ...args);
    const payload: unknown = args[0];
    if (this.component != null && isLoggableEvent(payload)) {
      this.logger?.debug(this.component, payload);
    }
  }
}
