import { EventListener, WEEKDAYS, weekdayIndex } from './event-listener.js';

/**
 * One event per local weekday, changing at local midnight.
 */
export class WeekdayEventListener extends EventListener {
  readonly type = 'weekday';
  readonly events = WEEKDAYS;

  eventAt(now: Date): string {
    return WEEKDAYS[weekdayIndex(now)] ?? 'monday';
  }

  timeUntilNextEventAt(now: Date): number {
    const midnight = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
    return midnight.getTime() - now.getTime();
  }
}
