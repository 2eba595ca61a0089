import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithLogging } from "./mixins/logging.mixin";

export interface BaseServiceConfig extends Record<string, unknown> {
  useEnhancedLogging?: boolean;
}

class Root {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {}
}

const Configurable = WithConfiguration<BaseServiceConfig>({ useEnhancedLogging: false })(WithLogging(Root));

/**
 * Nest logger plus per-instance settings. `useEnhancedLogging` swaps the structured logger in or out
 * whenever it changes.
 */
export class ServiceCore extends Configurable {
  constructor(config?: Partial<BaseServiceConfig>) {
    super();
    if (config) this.updateConfig(config);
  }

  override onConfigUpdated(previous: BaseServiceConfig, next: BaseServiceConfig): void {
    if (next.useEnhancedLogging !== undefined && previous.useEnhancedLogging !== next.useEnhancedLogging) {
      this.initializeEnhancedLogging(next.useEnhancedLogging);
    }
  }
}

export abstract class BaseService extends ServiceCore {}
