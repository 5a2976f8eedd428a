// src/lib/time.utils.ts

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats a date as local "YYYY-MM-DD HH:MM:SS", the format used for the
 * created_at / recorded_at fields of stored records.
 */
export const formatTimestamp = (date: Date = new Date()): string => {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
};

/**
 * Orders two date strings newest first by plain string comparison.
 * ISO "YYYY-MM-DD" values sort correctly this way; free-form dates do not.
 */
export const compareDateStringsDesc = (a: string, b: string): number => {
  if (a === b) return 0;
  return a < b ? 1 : -1;
};
