import { EventListener, ONE_HUNDRED_YEARS } from './event-listener.js';

export class StaticEventListener extends EventListener {
  readonly type = 'static';
  readonly events = ['static'] as const;

  eventAt(): string {
    return 'static';
  }

  timeUntilNextEventAt(): number {
    return ONE_HUNDRED_YEARS;
  }
}
