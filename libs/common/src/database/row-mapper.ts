/**
 * Conversions shared by every row-to-JSON mapping.
 *
 * `pg` hands temporal columns back either as `Date` (timestamptz) or as
 * text (DATE and TIMESTAMP, see DatabaseService), and aggregate numerics
 * (`SUM`, `COUNT`, `numeric`) as text.
 */

export type SqlTemporal = Date | string | null | undefined;
export type SqlNumeric = number | string | null | undefined;

const DATE_PART = /^(\d{4}-\d{2}-\d{2})/;
const TIME_PART = /(\d{2}):(\d{2}):(\d{2})/;

type TemporalParts = { date: string | null; time: string | null };

const pad = (n: number) => String(n).padStart(2, '0');

function splitTemporal(value: Date | string): TemporalParts {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return { date: null, time: null };
    }
    return {
      date: `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`,
      time: `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`,
    };
  }

  const date = DATE_PART.exec(value)?.[1] ?? null;
  const rest = date ? value.slice(date.length) : value;
  const time = TIME_PART.exec(rest);
  return { date, time: time ? `${time[1]}:${time[2]}:${time[3]}` : null };
}

/** `YYYY-MM-DD` */
export function formatDate(value: SqlTemporal): string | null {
  if (value === null || value === undefined) return null;
  return splitTemporal(value).date;
}

/** `YYYY-MM-DD HH:MM:SS`; a bare date renders at midnight. */
export function formatDateTime(value: SqlTemporal): string | null {
  if (value === null || value === undefined) return null;
  const { date, time } = splitTemporal(value);
  if (!date) return null;
  return `${date} ${time ?? '00:00:00'}`;
}

/** `HH:MM:SS` */
export function formatTime(value: SqlTemporal): string | null {
  if (value === null || value === undefined) return null;
  return splitTemporal(value).time;
}

/** Hour of day (0-23), or null when the value carries no time. */
export function hourOf(value: SqlTemporal): number | null {
  const time = formatTime(value);
  return time === null ? null : parseInt(time.slice(0, 2), 10);
}

/** Geo and other optional numerics: absent stays null, a stored zero stays zero. */
export function toNullableNumber(value: SqlNumeric): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Counts and sums: NULL (an empty SUM) is zero. */
export function toCount(value: SqlNumeric): number {
  return toNullableNumber(value) ?? 0;
}
