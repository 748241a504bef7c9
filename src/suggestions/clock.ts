export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * ISO-8601 in local time with the UTC offset, e.g. `2026-03-04T09:15:02.481+01:00`.
 */
export const toLocalIsoString = (date: Date): string => {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absOffset = Math.abs(offsetMinutes);

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`
  );
};

/** Whole days elapsed between `timestamp` and `now`; NaN when the timestamp does not parse. */
export const ageInDays = (timestamp: string, now: Date): number => {
  const created = Date.parse(timestamp);
  if (Number.isNaN(created)) return Number.NaN;
  return Math.floor((now.getTime() - created) / DAY_MS);
};
