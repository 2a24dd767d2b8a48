import { getTimes } from 'suncalc';

import { DAY, EventListener, SECOND, type EventListenerOptions } from './event-listener.js';

export interface SolarOptions extends EventListenerOptions {
  latitude?: number;
  longitude?: number;
  elevation?: number;
}

export interface SunTimes {
  dawn: Date;
  sunrise: Date;
  noon: Date;
  sunset: Date;
  dusk: Date;
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Fixed boundaries for days on which the sun never crosses the horizon
 * thresholds (polar day and night).
 */
export function hardcodedSun(date: Date): SunTimes {
  const at = (hour: number) => new Date(date.getFullYear(), date.getMonth(), date.getDate(), hour);
  return { dawn: at(5), sunrise: at(6), noon: at(12), sunset: at(22), dusk: at(23) };
}

/**
 * Follows the sun: night, sunrise (dawn to sunrise), morning, afternoon and
 * sunset (sunset to dusk).
 */
export class SolarEventListener extends EventListener {
  readonly type: string = 'solar';
  readonly events: readonly string[] = ['sunrise', 'morning', 'afternoon', 'sunset', 'night'];
  readonly latitude: number;
  readonly longitude: number;
  readonly elevation: number;

  constructor(options: SolarOptions) {
    super(options);
    this.latitude = options.latitude ?? 0;
    this.longitude = options.longitude ?? 0;
    this.elevation = options.elevation ?? 0;
  }

  /**
   * Solar boundaries of the local calendar day containing `date`.
   */
  sunTimes(date: Date): SunTimes {
    const noon = new Date(date.getFullYear(), date.getMonth(), date.getDate(), 12);
    const times = getTimes(noon, this.latitude, this.longitude, this.elevation);
    const sun: SunTimes = {
      dawn: times.dawn,
      sunrise: times.sunrise,
      noon: times.solarNoon,
      sunset: times.sunset,
      dusk: times.dusk,
    };
    return Object.values(sun).every(isValidDate) ? sun : hardcodedSun(date);
  }

  eventAt(now: Date): string {
    const sun = this.sunTimes(now);
    if (now < sun.dawn) return 'night';
    if (now < sun.sunrise) return 'sunrise';
    if (now < sun.noon) return 'morning';
    if (now < sun.sunset) return 'afternoon';
    if (now < sun.dusk) return 'sunset';
    return 'night';
  }

  timeUntilNextEventAt(now: Date): number {
    const future = (sun: SunTimes) =>
      Object.values(sun)
        .map((date) => date.getTime())
        .filter((time) => time > now.getTime());

    let upcoming = future(this.sunTimes(now));
    if (upcoming.length === 0) {
      // Past today's dusk: the next boundary belongs to tomorrow.
      upcoming = future(this.sunTimes(new Date(now.getTime() + DAY - SECOND)));
    }
    if (upcoming.length === 0) return DAY;
    return Math.min(...upcoming) - now.getTime();
  }
}
