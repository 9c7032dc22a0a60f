import { subDays } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { SalesMetrics } from '../../sales/interfaces/sales.interface';
import { KpiCard, PosFilterState, PosWindow } from '../interfaces/dashboard.interface';

export const DATE_FORMAT = 'yyyy-MM-dd';
export const TIME_FORMAT = 'HH:mm';

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatCount(value: number): string {
  return wholeNumber.format(value);
}

export function formatRupiah(value: number): string {
  return `Rp ${wholeNumber.format(value)}`;
}

/** Last 24 hours ending now, seconds dropped. */
export function defaultFilterState(timeZone: string, now: Date = new Date()): PosFilterState {
  const start = subDays(now, 1);
  return {
    startDate: formatInTimeZone(start, timeZone, DATE_FORMAT),
    startTime: formatInTimeZone(start, timeZone, TIME_FORMAT),
    endDate: formatInTimeZone(now, timeZone, DATE_FORMAT),
    endTime: formatInTimeZone(now, timeZone, TIME_FORMAT),
  };
}

export function resolveWindow(filter: PosFilterState, timeZone: string): PosWindow {
  const start = fromZonedTime(`${filter.startDate}T${filter.startTime}:00`, timeZone);
  const end = fromZonedTime(`${filter.endDate}T${filter.endTime}:00`, timeZone);

  return {
    filter,
    start,
    end,
    caption: `Showing POS orders from ${filter.startDate} ${filter.startTime} to ${filter.endDate} ${filter.endTime}.`,
  };
}

export function buildKpiCards(metrics: SalesMetrics): KpiCard[] {
  return [
    { title: 'POS Orders (range)', value: formatCount(metrics.posOrderCount) },
    { title: 'POS Revenue', value: formatRupiah(metrics.posTotalAmount) },
    { title: 'Confirmed Sales Orders', value: formatCount(metrics.totalConfirmedOrders) },
    { title: 'Sales Revenue', value: formatRupiah(metrics.totalConfirmedAmount) },
  ];
}

export function placeholderKpiCards(): KpiCard[] {
  return Array.from({ length: 4 }, () => ({ title: '--', value: '---' }));
}
