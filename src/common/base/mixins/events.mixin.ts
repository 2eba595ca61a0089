import { EventEmitter } from "events";
import type { Constructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

export interface EventCapabilities {
  emit(event: string, ...args: unknown[]): boolean;
  on<T extends unknown[]>(event: string, listener: (...args: T) => void): this;
  once<T extends unknown[]>(event: string, listener: (...args: T) => void): this;
  listenerCount(event: string): number;
  emitWithLogging(event: string, ...args: unknown[]): boolean;
}

/**
 * Mixin that adds an event emitter to a service. A listener that throws is logged and does not
 * reach the emitting code path.
 */
export function WithEvents<TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
  return class EventsMixin extends Base implements EventCapabilities {
    public readonly eventEmitter = new EventEmitter();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.eventEmitter.setMaxListeners(20);
      this.eventEmitter.on("error", (error: unknown) => this.logError(error, "EventEmitter"));
    }

    emit(event: string, ...args: unknown[]): boolean {
      return this.eventEmitter.emit(event, ...args);
    }

    on<T extends unknown[]>(event: string, listener: (...args: T) => void): this {
      this.eventEmitter.on(event, this.guard(event, listener));
      return this;
    }

    once<T extends unknown[]>(event: string, listener: (...args: T) => void): this {
      this.eventEmitter.once(event, this.guard(event, listener));
      return this;
    }

    listenerCount(event: string): number {
      return this.eventEmitter.listenerCount(event);
    }

    emitWithLogging(event: string, ...args: unknown[]): boolean {
      this.logDebug(`Emitting event: ${event}`);
      return this.emit(event, ...args);
    }

    public guard<T extends unknown[]>(event: string, listener: (...args: T) => void): (...args: T) => void {
      return (...args: T): void => {
        try {
          listener(...args);
        } catch (error) {
          this.logError(error, `listener:${event}`);
        }
      };
    }
  };
}
