import { subHours } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

export const ODOO_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Odoo stores datetimes as naive UTC strings. */
export function toOdooDatetime(date: Date): string {
  return formatInTimeZone(date, 'UTC', ODOO_DATETIME_FORMAT);
}

export function resolvePosWindow(start?: Date, end?: Date): { start: Date; end: Date } {
  const resolvedEnd = end ?? new Date();
  return {
    start: start ?? subHours(resolvedEnd, 24),
    end: resolvedEnd,
  };
}
