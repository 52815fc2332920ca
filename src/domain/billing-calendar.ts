import type { BillingInterval } from "./types.js";

const DAY_MS = 86_400_000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

function addMonths(iso: string, months: number): string {
  const source = new Date(iso);
  const targetMonth = source.getUTCMonth() + months;
  const year = source.getUTCFullYear() + Math.floor(targetMonth / 12);
  const monthIndex = ((targetMonth % 12) + 12) % 12;
  // Jan 31 + 1 month lands on the last day of February.
  const day = Math.min(source.getUTCDate(), daysInMonth(year, monthIndex));
  const shifted = new Date(
    Date.UTC(
      year,
      monthIndex,
      day,
      source.getUTCHours(),
      source.getUTCMinutes(),
      source.getUTCSeconds(),
      source.getUTCMilliseconds(),
    ),
  );
  return shifted.toISOString();
}

export function addInterval(iso: string, interval: BillingInterval): string {
  return interval === "monthly" ? addMonths(iso, 1) : addMonths(iso, 12);
}

export function addDays(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * DAY_MS).toISOString();
}

export function addSeconds(iso: string, seconds: number): string {
  return new Date(Date.parse(iso) + seconds * 1000).toISOString();
}

export function isOnOrBefore(left: string, right: string): boolean {
  return Date.parse(left) <= Date.parse(right);
}

export function isUtcDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return Number.isFinite(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export interface UtcDayBounds {
  /** Last instant of the previous day; balances as of this point exclude the day itself. */
  before: string;
  start: string;
  end: string;
}

export function utcDayBounds(date: string): UtcDayBounds {
  const startMs = Date.parse(`${date}T00:00:00.000Z`);
  return {
    before: new Date(startMs - 1).toISOString(),
    start: new Date(startMs).toISOString(),
    end: new Date(startMs + DAY_MS - 1).toISOString(),
  };
}

export function utcDateOf(iso: string): string {
  return iso.slice(0, 10);
}

export function previousUtcDate(iso: string): string {
  return utcDateOf(new Date(Date.parse(iso) - DAY_MS).toISOString());
}
