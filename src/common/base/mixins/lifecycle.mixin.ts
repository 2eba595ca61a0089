import type { OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import type { Constructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

export interface LifecycleCapabilities {
  isServiceInitialized(): boolean;
  isServiceDestroyed(): boolean;
  createTimeout(callback: () => void, delay: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
  getManagedTimerCount(): number;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Runs the optional `initialize` and `cleanup` hooks from Nest's module lifecycle, once each however
 * often Nest (or a test) calls in. Timeouts made with `createTimeout` are unref'd and die with the service.
 */
export function WithLifecycle<TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
  return class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public readonly managedTimers = new Set<NodeJS.Timeout>();
    public started?: Promise<void>;
    public stopped?: Promise<void>;
    public ready = false;
    public destroyed = false;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    onModuleInit(): Promise<void> {
      this.started ??= this.start();
      return this.started;
    }

    onModuleDestroy(): Promise<void> {
      this.stopped ??= this.stop();
      return this.stopped;
    }

    isServiceInitialized(): boolean {
      return this.ready;
    }

    isServiceDestroyed(): boolean {
      return this.destroyed;
    }

    createTimeout(callback: () => void, delay: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.managedTimers.delete(timer);
        if (!this.destroyed) callback();
      }, Math.max(0, delay));
      timer.unref();
      this.managedTimers.add(timer);
      return timer;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      clearTimeout(timer);
      this.managedTimers.delete(timer);
    }

    getManagedTimerCount(): number {
      return this.managedTimers.size;
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async start(): Promise<void> {
      try {
        await this.initialize?.();
      } catch (error) {
        this.logError(error, "initialize");
        throw error;
      }
      this.ready = true;
      this.logInitialization();
    }

    public async stop(): Promise<void> {
      this.logShutdown();
      for (const timer of this.managedTimers) clearTimeout(timer);
      this.managedTimers.clear();
      this.destroyed = true;
      try {
        await this.cleanup?.();
      } catch (error) {
        this.logError(error, "cleanup");
        throw error;
      }
    }
  };
}
