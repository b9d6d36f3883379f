/**
 * Calendar-date helpers shared by provider adapters and the series aligner.
 * Calendar dates travel as ISO strings (YYYY-MM-DD) so they sort lexically.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

/**
 * Provider timestamps are epoch seconds in UTC.
 */
export const epochSecondsToIsoDate = (seconds: number): string =>
  toIsoDate(new Date(seconds * 1000));

export const isIsoDate = (value: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) &&
  !Number.isNaN(Date.parse(`${value}T00:00:00.000Z`));

export const subtractDays = (isoDate: string, days: number): string =>
  toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00.000Z`) - days * DAY_MS));
