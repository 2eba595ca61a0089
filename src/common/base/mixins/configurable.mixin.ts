import type { Constructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

export interface ConfigurableCapabilities<TConfig extends Record<string, unknown>> {
  updateConfig(patch: Partial<TConfig>): void;
  getConfig(): Readonly<TConfig>;
  onConfigUpdated?(previous: TConfig, next: TConfig): void;
}

/**
 * Per-instance service settings with a change hook. Needs logging underneath it.
 */
export function WithConfiguration<TConfig extends Record<string, unknown>>(defaults: TConfig) {
  return function <TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
    return class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig = { ...defaults };

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
      }

      updateConfig(patch: Partial<TConfig>): void {
        const previous = this.config;
        this.config = { ...previous, ...patch };

        const changed = Object.keys(patch).filter(key => previous[key] !== this.config[key]);
        if (changed.length === 0) {
          return;
        }
        this.onConfigUpdated?.(previous, this.config);
        this.logger.debug(`Settings changed: ${changed.join(", ")}`);
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      onConfigUpdated?(previous: TConfig, next: TConfig): void;
    };
  };
}
