import type { Clock, Logger } from '../types.js';

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

/** Wait used by listeners whose event never changes. */
export const ONE_HUNDRED_YEARS = 36500 * DAY;

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type WeekdayName = (typeof WEEKDAYS)[number];

/**
 * Monday-first index of the local weekday of `date`.
 */
export function weekdayIndex(date: Date): number {
  return (date.getDay() + 6) % 7;
}

export interface EventListenerOptions {
  clock: Clock;
  logger: Logger;
  /** Always reported instead of the computed event. */
  forceEvent?: string;
}

/**
 * Names the current event of a module and tells how long it stays current.
 */
export abstract class EventListener {
  abstract readonly type: string;
  abstract readonly events: readonly string[];

  protected readonly clock: Clock;
  protected readonly logger: Logger;
  readonly forceEvent: string | undefined;

  constructor(options: EventListenerOptions) {
    this.clock = options.clock;
    this.logger = options.logger;
    this.forceEvent = options.forceEvent;
  }

  event(): string {
    if (this.forceEvent !== undefined && this.forceEvent !== '') {
      if (!this.isValidEvent(this.forceEvent)) {
        this.logger.warn(
          { eventListener: this.type, forceEvent: this.forceEvent },
          `[event_listener/${this.type}] option \`force_event\` set to "${this.forceEvent}", ` +
            `which is not a valid event for this event listener: ${this.events.join(', ')}. ` +
            'Still using the option in case it is intentional.',
        );
      }
      return this.forceEvent;
    }
    return this.eventAt(this.clock());
  }

  isValidEvent(event: string): boolean {
    return this.events.includes(event);
  }

  /**
   * Milliseconds until `event()` may change.
   */
  timeUntilNextEvent(): number {
    return this.timeUntilNextEventAt(this.clock());
  }

  abstract eventAt(now: Date): string;

  abstract timeUntilNextEventAt(now: Date): number;
}
