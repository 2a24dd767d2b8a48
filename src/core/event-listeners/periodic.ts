import { DAY, EventListener, HOUR, MINUTE, SECOND, type EventListenerOptions } from './event-listener.js';

export interface PeriodicOptions extends EventListenerOptions {
  seconds?: number;
  minutes?: number;
  hours?: number;
  days?: number;
}

/**
 * Counts whole periods elapsed since construction: "0", "1", "2", ...
 */
export class PeriodicEventListener extends EventListener {
  readonly type = 'periodic';
  readonly events: readonly string[] = [];
  readonly period: number;
  readonly initializedAt: Date;

  constructor(options: PeriodicOptions) {
    super(options);
    const period =
      (options.seconds ?? 0) * SECOND +
      (options.minutes ?? 0) * MINUTE +
      (options.hours ?? 0) * HOUR +
      (options.days ?? 0) * DAY;
    this.period = period > 0 ? period : HOUR;
    this.initializedAt = this.clock();
  }

  override isValidEvent(event: string): boolean {
    return /^\d+$/.test(event);
  }

  private elapsed(now: Date): number {
    return Math.max(0, now.getTime() - this.initializedAt.getTime());
  }

  eventAt(now: Date): string {
    return String(Math.floor(this.elapsed(now) / this.period));
  }

  timeUntilNextEventAt(now: Date): number {
    return this.period - (this.elapsed(now) % this.period);
  }
}
