const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Local calendar day ("YYYY-MM-DD") of an instant under a fixed UTC offset.
 */
export function dayKey(instant: Date | string, utcOffsetMinutes = 0): string {
  const ms = new Date(instant).getTime() + utcOffsetMinutes * 60_000;
  return new Date(ms).toISOString().slice(0, 10);
}

export function shiftDay(key: string, days: number): string {
  return new Date(Date.parse(`${key}T00:00:00.000Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Instant at which the Monday-started week containing `now` begins.
 */
export function weekStart(now: Date, utcOffsetMinutes = 0): Date {
  const today = dayKey(now, utcOffsetMinutes);
  const weekday = new Date(`${today}T00:00:00.000Z`).getUTCDay();
  const monday = shiftDay(today, -((weekday + 6) % 7));
  return new Date(Date.parse(`${monday}T00:00:00.000Z`) - utcOffsetMinutes * 60_000);
}

export function addDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * DAY_MS);
}
