/**
 * Wall-clock formatting in the US market time zones
 */

export const TIME_ZONES = Object.freeze({
  eastern: 'America/New_York',
  central: 'America/Chicago',
  mountain: 'America/Denver',
  pacific: 'America/Los_Angeles',
});

export type MarketZone = keyof typeof TIME_ZONES;

interface ZonedParts {
  year: string;
  month: string;
  shortMonth: string;
  day: string;
  hour: string;
  minute: string;
  dayPeriod: string;
  zoneName: string;
}

const formatters = new Map<string, Intl.DateTimeFormat[]>();

function formattersFor(timeZone: string): Intl.DateTimeFormat[] {
  let cached = formatters.get(timeZone);
  if (!cached) {
    cached = [
      new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'long',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        hour12: true,
        timeZoneName: 'short',
      }),
      new Intl.DateTimeFormat('en-US', { timeZone, month: 'short' }),
      new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }),
    ];
    formatters.set(timeZone, cached);
  }
  return cached;
}

// Parts are assembled by hand; ICU's own joins use narrow no-break spaces
function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const [full, short] = formattersFor(timeZone);
  const parts = new Map(full.formatToParts(instant).map((part) => [part.type, part.value]));
  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.get(type) ?? '';
  return {
    year: pick('year'),
    month: pick('month'),
    shortMonth: short.format(instant),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
    dayPeriod: pick('dayPeriod').toUpperCase(),
    zoneName: pick('timeZoneName'),
  };
}

/** "07:30 PM" */
export function formatClock(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.hour}:${p.minute} ${p.dayPeriod}`;
}

/** "7:30 PM" */
export function formatShortClock(instant: Date, timeZone: string): string {
  return formatClock(instant, timeZone).replace(/^0/, '');
}

/** "February 05, 2021" */
export function formatLongDate(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.month} ${p.day}, ${p.year}`;
}

/** "Feb 05" */
export function formatShortDate(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.shortMonth} ${p.day}`;
}

/** "February 26, 2021 7:30 PM EST" */
export function formatStartTime(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.month} ${p.day}, ${p.year} ${p.hour.replace(/^0/, '')}:${p.minute} ${p.dayPeriod} ${p.zoneName}`;
}

/** Calendar date key "YYYY-MM-DD" of an instant in a zone */
export function calendarDay(instant: Date, timeZone: string): string {
  const numeric = formattersFor(timeZone)[2];
  const parts = new Map(numeric.formatToParts(instant).map((part) => [part.type, part.value]));
  return `${parts.get('year')}-${parts.get('month')}-${parts.get('day')}`;
}

/** Shifts a "YYYY-MM-DD" key by whole days */
export function shiftDay(day: string, days: number): string {
  const date = new Date(`${day}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
