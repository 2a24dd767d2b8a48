import { z } from 'zod';

import { formatIssues } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { Clock, Logger } from '../types.js';
import { DaylightEventListener } from './daylight.js';
import { WEEKDAYS, type EventListener } from './event-listener.js';
import { PeriodicEventListener } from './periodic.js';
import { SolarEventListener } from './solar.js';
import { StaticEventListener } from './static.js';
import { TimeOfDayEventListener } from './time-of-day.js';
import { WeekdayEventListener } from './weekday.js';

export { EventListener } from './event-listener.js';
export { DaylightEventListener } from './daylight.js';
export { PeriodicEventListener } from './periodic.js';
export { SolarEventListener } from './solar.js';
export { StaticEventListener } from './static.js';
export { TimeOfDayEventListener } from './time-of-day.js';
export { WeekdayEventListener } from './weekday.js';

const forceEvent = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional();

const location = {
  latitude: z.number().min(-90).max(90).default(0),
  longitude: z.number().min(-180).max(180).default(0),
  elevation: z.number().default(0),
};

const duration = z.number().nonnegative().default(0);

const interval = z.string().nullable().optional();

export const eventListenerSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('static'), force_event: forceEvent }).strict(),
  z.object({ type: z.literal('weekday'), force_event: forceEvent }).strict(),
  z
    .object({
      type: z.literal('periodic'),
      force_event: forceEvent,
      seconds: duration,
      minutes: duration,
      hours: duration,
      days: duration,
    })
    .strict(),
  z.object({ type: z.literal('solar'), force_event: forceEvent, ...location }).strict(),
  z.object({ type: z.literal('daylight'), force_event: forceEvent, ...location }).strict(),
  z
    .object({
      type: z.literal('time_of_day'),
      force_event: forceEvent,
      monday: interval,
      tuesday: interval,
      wednesday: interval,
      thursday: interval,
      friday: interval,
      saturday: interval,
      sunday: interval,
    })
    .strict(),
]);

export type EventListenerConfig = z.input<typeof eventListenerSchema>;

export type EventListenerType = EventListenerConfig['type'];

/**
 * Build the event listener described by `config`; no configuration means a
 * static listener.
 */
export function createEventListener(
  config: unknown,
  options: { clock: Clock; logger: Logger },
): EventListener {
  const result = eventListenerSchema.safeParse(config ?? { type: 'static' });
  if (!result.success) {
    throw new ConfigurationError(`Invalid event listener: ${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  const base = { ...options, forceEvent: parsed.force_event };
  switch (parsed.type) {
    case 'static':
      return new StaticEventListener(base);
    case 'weekday':
      return new WeekdayEventListener(base);
    case 'periodic':
      return new PeriodicEventListener({
        ...base,
        seconds: parsed.seconds,
        minutes: parsed.minutes,
        hours: parsed.hours,
        days: parsed.days,
      });
    case 'solar':
      return new SolarEventListener({
        ...base,
        latitude: parsed.latitude,
        longitude: parsed.longitude,
        elevation: parsed.elevation,
      });
    case 'daylight':
      return new DaylightEventListener({
        ...base,
        latitude: parsed.latitude,
        longitude: parsed.longitude,
        elevation: parsed.elevation,
      });
    case 'time_of_day': {
      const schedule = Object.fromEntries(
        WEEKDAYS.filter((weekday) => parsed[weekday] !== undefined).map((weekday) => [
          weekday,
          parsed[weekday] ?? '',
        ]),
      );
      return new TimeOfDayEventListener({ ...base, schedule });
    }
  }
}
