import { ServiceCore } from "./base.service";
import { WithEvents } from "./mixins/events.mixin";
import { WithLifecycle } from "./mixins/lifecycle.mixin";

export abstract class EventService extends WithEvents(ServiceCore) {}

/** Event service with module init/destroy hooks and managed timers. */
export abstract class LifecycleService extends WithLifecycle(WithEvents(ServiceCore)) {}
