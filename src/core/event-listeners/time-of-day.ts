import { ConfigurationError } from '../errors.js';
import {
  DAY,
  EventListener,
  MINUTE,
  ONE_HUNDRED_YEARS,
  WEEKDAYS,
  weekdayIndex,
  type EventListenerOptions,
  type WeekdayName,
} from './event-listener.js';

export type WeeklySchedule = Partial<Record<WeekdayName, string | null>>;

export const DEFAULT_SCHEDULE: Record<WeekdayName, string> = {
  monday: '09:00-17:00',
  tuesday: '09:00-17:00',
  wednesday: '09:00-17:00',
  thursday: '09:00-17:00',
  friday: '09:00-17:00',
  saturday: '',
  sunday: '',
};

interface Interval {
  /** Milliseconds from Monday 00:00. */
  start: number;
  end: number;
}

const INTERVAL = /^\s*(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})\s*$/;

function minutesOf(hours: string, minutes: string, source: string): number {
  const total = Number(hours) * 60 + Number(minutes);
  if (Number(minutes) > 59 || total > 24 * 60) {
    throw new ConfigurationError(`Invalid time in interval "${source}"`);
  }
  return total;
}

export function parseInterval(value: string, day: number): Interval | undefined {
  if (!value.trim()) return undefined;
  const match = INTERVAL.exec(value);
  if (!match) {
    throw new ConfigurationError(`Invalid time interval "${value}", expected HH:MM-HH:MM`);
  }
  const [, startHours = '0', startMinutes = '0', endHours = '0', endMinutes = '0'] = match;
  const start = minutesOf(startHours, startMinutes, value);
  const end = minutesOf(endHours, endMinutes, value);
  if (end <= start) {
    throw new ConfigurationError(`Time interval "${value}" must end after it starts`);
  }
  return { start: day * DAY + start * MINUTE, end: day * DAY + end * MINUTE };
}

/**
 * "on" inside the configured interval of the current weekday, "off" otherwise.
 */
export class TimeOfDayEventListener extends EventListener {
  readonly type = 'time_of_day';
  readonly events = ['on', 'off'] as const;
  private readonly intervals: Interval[];

  constructor(options: EventListenerOptions & { schedule?: WeeklySchedule }) {
    super(options);
    const schedule = { ...DEFAULT_SCHEDULE, ...options.schedule };
    this.intervals = WEEKDAYS.flatMap((weekday, day) => {
      const interval = parseInterval(schedule[weekday] ?? '', day);
      return interval ? [interval] : [];
    });
  }

  private weekOffset(now: Date): number {
    const midnight = new Date(now.getFullYear(), now.getMonth(), now.getDate());
    return weekdayIndex(now) * DAY + (now.getTime() - midnight.getTime());
  }

  eventAt(now: Date): string {
    const offset = this.weekOffset(now);
    return this.intervals.some(({ start, end }) => start <= offset && offset < end) ? 'on' : 'off';
  }

  timeUntilNextEventAt(now: Date): number {
    if (this.intervals.length === 0) return ONE_HUNDRED_YEARS;

    const offset = this.weekOffset(now);
    const boundaries = this.intervals.flatMap(({ start, end }) => [start, end]);
    const later = boundaries.filter((boundary) => boundary > offset);
    if (later.length > 0) return Math.min(...later) - offset;

    // Nothing left this week; wrap to the first boundary of next week.
    return Math.min(...boundaries) + 7 * DAY - offset;
  }
}
