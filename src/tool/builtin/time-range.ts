// pattern: Functional Core

const HOUR_MS = 60 * 60 * 1000;

/**
 * Start of a window reaching back `hours` from `end`. Throws when the start falls outside
 * the range a Date can represent, so the caller reports the parameter instead of a RangeError.
 */
export function windowStart(end: Date, hours: number): Date {
  const start = new Date(end.getTime() - hours * HOUR_MS);
  if (Number.isNaN(start.getTime())) {
    throw new Error(`time_range_hours is too large: ${hours}`);
  }
  return start;
}
