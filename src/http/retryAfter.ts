const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// IMF-fixdate / RFC 1123 / RFC 2822: "Sun, 06 Nov 1994 08:49:37 GMT"
const RFC1123 =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([A-Za-z]{1,3}|[+-]\d{4}))?$/;
// RFC 850: "Sunday, 06-Nov-94 08:49:37 GMT"
const RFC850 =
  /^[A-Za-z]+,\s*(\d{1,2})-([A-Za-z]{3})-(\d{2,4})\s+(\d{1,2}):(\d{2}):(\d{2})(?:\s+([A-Za-z]{1,3}|[+-]\d{4}))?$/;
// asctime: "Sun Nov  6 08:49:37 1994"
const ASCTIME =
  /^[A-Za-z]{3}\s+([A-Za-z]{3})\s+(\d{1,2})\s+(\d{1,2}):(\d{2}):(\d{2})\s+(\d{4})$/;

/**
 * Parse a Retry-After header value into seconds to wait.
 *
 * Delta-seconds are returned as written (no clamping). HTTP-dates yield
 * `max(0, date - now)`; a date without a zone is taken as UTC.
 * Returns `undefined` when there is no usable hint.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: () => number = Date.now,
): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  if (NUMERIC.test(trimmed)) {
    const seconds = Number(trimmed);
    return Number.isFinite(seconds) ? seconds : undefined;
  }

  const epochMs = parseHttpDate(trimmed);
  if (epochMs === undefined) return undefined;
  return Math.max(0, (epochMs - now()) / 1000);
}

/**
 * Parse an HTTP-date in any of the three RFC 7231 forms. Returns epoch milliseconds.
 */
export function parseHttpDate(value: string): number | undefined {
  let match = RFC1123.exec(value);
  if (match) {
    const [, day, month, year, hour, minute, second, zone] = match;
    return toEpochMs(year, month, day, hour, minute, second ?? "0", zone);
  }

  match = RFC850.exec(value);
  if (match) {
    const [, day, month, year, hour, minute, second, zone] = match;
    return toEpochMs(year, month, day, hour, minute, second, zone);
  }

  match = ASCTIME.exec(value);
  if (match) {
    const [, month, day, hour, minute, second, year] = match;
    return toEpochMs(year, month, day, hour, minute, second, undefined);
  }

  return undefined;
}

function toEpochMs(
  yearText: string | undefined,
  monthText: string | undefined,
  dayText: string | undefined,
  hourText: string | undefined,
  minuteText: string | undefined,
  secondText: string | undefined,
  zone: string | undefined,
): number | undefined {
  if (!yearText || !monthText || !dayText || !hourText || !minuteText || !secondText) {
    return undefined;
  }
  const month = MONTHS[monthText.toLowerCase()];
  if (month === undefined) return undefined;

  let year = Number(yearText);
  if (yearText.length <= 2) {
    year += year > 68 ? 1900 : 2000;
  }
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  if (day < 1 || day > 31 || hour > 23 || minute > 59 || second > 60) {
    return undefined;
  }

  const offsetMinutes = zoneOffsetMinutes(zone);
  if (offsetMinutes === undefined) return undefined;

  // Date.UTC rolls "31 Feb" over into March
  const calendarDay = new Date(Date.UTC(year, month, day));
  if (calendarDay.getUTCMonth() !== month || calendarDay.getUTCDate() !== day) {
    return undefined;
  }

  const utc = Date.UTC(year, month, day, hour, minute, second);
  return utc - offsetMinutes * 60_000;
}

function zoneOffsetMinutes(zone: string | undefined): number | undefined {
  if (zone === undefined) return 0;
  const upper = zone.toUpperCase();
  if (upper === "GMT" || upper === "UTC" || upper === "UT" || upper === "Z") return 0;
  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (!numeric) return undefined;
  const [, sign, hours, minutes] = numeric;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -total : total;
}
