/**
 * Local-clock date helpers for partition naming
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Partition key for a timestamp on the service's local clock, e.g. `20240105`
 */
export function partitionKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * `20240105` -> `2024-01-05`
 */
export function partitionKeyToIsoDate(key: string): string {
  return `${key.slice(0, 4)}-${key.slice(4, 6)}-${key.slice(6, 8)}`;
}

/**
 * Local midnight at the start of the day holding `date`
 */
export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}
