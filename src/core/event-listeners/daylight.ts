import { DAY, EventListener, SECOND } from './event-listener.js';
import { SolarEventListener, type SolarOptions } from './solar.js';

/**
 * "day" between dawn and dusk, "night" otherwise.
 */
export class DaylightEventListener extends EventListener {
  readonly type = 'daylight';
  readonly events = ['day', 'night'] as const;
  private readonly solar: SolarEventListener;

  constructor(options: SolarOptions) {
    super(options);
    this.solar = new SolarEventListener({ ...options, forceEvent: undefined });
  }

  eventAt(now: Date): string {
    return this.solar.eventAt(now) === 'night' ? 'night' : 'day';
  }

  timeUntilNextEventAt(now: Date): number {
    const boundary = this.eventAt(now) === 'night' ? 'dawn' : 'dusk';
    let next = this.solar.sunTimes(now)[boundary];
    if (next.getTime() <= now.getTime()) {
      next = this.solar.sunTimes(new Date(now.getTime() + DAY - SECOND))[boundary];
    }
    const remaining = next.getTime() - now.getTime();
    return remaining > 0 ? remaining : DAY;
  }
}
