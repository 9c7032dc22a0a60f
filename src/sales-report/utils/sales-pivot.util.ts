import { SheetCell, SheetData, SheetRecord } from '../../common/utils/workbook.util';
import {
  BarcodePivot,
  BrandGroup,
  PivotRow,
  SPLIT_BY_BRAND_PARENTS,
  SalesLine,
} from '../interfaces/sales-report.interface';
import { formatReportDate } from './sales-sheet.util';

export const UNKNOWN_BRAND = 'Unknown';
export const TOTAL_SELLOUT = 'Total Sellout';
export const BRAND_TOTAL_SUFFIX = ' - Total';

export function brandOf(line: SalesLine): string {
  return line.brand ?? UNKNOWN_BRAND;
}

export function dayOf(line: SalesLine): string {
  return formatReportDate(line.orderDate, 'yyyy-MM-dd');
}

export function isSplitByBrand(parentBrand: string): boolean {
  return SPLIT_BY_BRAND_PARENTS.includes(parentBrand);
}

/** Parent brand (or brand when it has none) ascending, blanks last, then order time. */
export function sortSalesLines(lines: SalesLine[]): SalesLine[] {
  return [...lines].sort(
    (a, b) =>
      compareText(a.parentBrand ?? a.brand, b.parentBrand ?? b.brand) ||
      a.orderDate.getTime() - b.orderDate.getTime(),
  );
}

/** One group per parent brand; split parents get one group per brand, keyed `<parent>_<brand>`. */
export function groupByParentBrand(lines: SalesLine[]): BrandGroup[] {
  const groups = new Map<string, BrandGroup>();
  for (const line of lines) {
    const parentBrand = line.parentBrand ?? line.brand ?? UNKNOWN_BRAND;
    const key = isSplitByBrand(parentBrand) ? `${parentBrand}_${brandOf(line)}` : parentBrand;

    let group = groups.get(key);
    if (!group) {
      group = { key, parentBrand, lines: [] };
      groups.set(key, group);
    }
    group.lines.push(line);
  }
  return [...groups.values()];
}

export function linesByDay(lines: SalesLine[]): Map<string, SalesLine[]> {
  return partition(lines, dayOf);
}

export function pivotByBarcode(lines: SalesLine[]): BarcodePivot {
  const days = new Set<string>();
  const rows = new Map<string, PivotRow>();

  for (const line of lines) {
    const day = dayOf(line);
    days.add(day);

    const key = JSON.stringify([line.barcode, line.product]);
    let row = rows.get(key);
    if (!row) {
      row = { barcode: line.barcode, product: line.product, quantities: {}, totals: {} };
      rows.set(key, row);
    }
    row.quantities[day] = (row.quantities[day] ?? 0) + line.quantity;
    row.totals[day] = (row.totals[day] ?? 0) + line.taxIncluded;
  }

  return {
    days: [...days].sort(),
    rows: [...rows.values()].sort(
      (a, b) => compareText(a.barcode, b.barcode) || compareText(a.product, b.product),
    ),
  };
}

/**
 * `Barcode`, `Produk`, then `Jumlah_<day>` and `Total_<day>` per day. Brand
 * organised sheets open every brand with a `<brand> Total Sellout` row,
 * the others open with a single `Total Sellout` row.
 */
export function pivotSheet(lines: SalesLine[], organizeByBrand: boolean): SheetData {
  const pivot = pivotByBarcode(lines);
  const columns = [
    'Barcode',
    'Produk',
    ...pivot.days.map((day) => `Jumlah_${day}`),
    ...pivot.days.map((day) => `Total_${day}`),
  ];

  if (!organizeByBrand) {
    return {
      columns,
      rows: [totalRecord(TOTAL_SELLOUT, pivot.days, pivot.rows), ...pivot.rows.map((row) => pivotRecord(row, pivot.days))],
    };
  }

  const rows: SheetRecord[] = [];
  for (const [brand, brandLines] of linesByBrand(lines)) {
    const brandRows = pivotByBarcode(brandLines).rows;
    rows.push(totalRecord(`${brand} ${TOTAL_SELLOUT}`, pivot.days, brandRows));
    rows.push(...brandRows.map((row) => pivotRecord(row, pivot.days)));
  }
  return { columns, rows };
}

/**
 * Every uploaded column except `Parent Brand`, ordered by order time. Brand
 * organised sheets open every brand with a `<brand> - Total` row carrying
 * its quantity and amount.
 */
export function detailedSheet(columns: string[], lines: SalesLine[], organizeByBrand: boolean): SheetData {
  const kept = columns.filter((column) => column !== 'Parent Brand');
  const sorted = [...lines].sort(
    (a, b) => a.orderDate.getTime() - b.orderDate.getTime() || compareText(orderTimeOf(a), orderTimeOf(b)),
  );

  if (!organizeByBrand) {
    return { columns: kept, rows: sorted.map((line) => detailRecord(line, kept)) };
  }

  const rows: SheetRecord[] = [];
  for (const [brand, brandLines] of linesByBrand(sorted)) {
    const header: SheetRecord = Object.fromEntries(kept.map((column): [string, SheetCell] => [column, '']));
    header.Brand = `${brand}${BRAND_TOTAL_SUFFIX}`;
    header.Quantity = sum(brandLines.map((line) => line.quantity));
    header['Tax Incl.'] = sum(brandLines.map((line) => line.taxIncluded));
    rows.push(header, ...brandLines.map((line) => detailRecord(line, kept)));
  }
  return { columns: kept, rows };
}

/** `ddMMyyyy` of a single day, `<first>_to_<last>` otherwise. */
export function dateLabel(lines: SalesLine[]): string {
  const { start, end } = orderDateRange(lines);
  const first = formatReportDate(start, 'ddMMyyyy');
  const last = formatReportDate(end, 'ddMMyyyy');
  return first === last ? first : `${first}_to_${last}`;
}

export function orderDateRange(lines: SalesLine[]): { start: Date; end: Date } {
  const times = lines.map((line) => line.orderDate.getTime());
  return {
    start: new Date(times.reduce((min, time) => Math.min(min, time), Infinity)),
    end: new Date(times.reduce((max, time) => Math.max(max, time), -Infinity)),
  };
}

export function sanitizeFileName(name: string): string {
  const sanitized = name.replace(/[<>:"/\\|?*]/g, '_').replace(/^[ .]+|[ .]+$/g, '');
  return sanitized === '' ? UNKNOWN_BRAND : sanitized;
}

function linesByBrand(lines: SalesLine[]): Map<string, SalesLine[]> {
  return partition(lines, brandOf);
}

function partition(lines: SalesLine[], keyOf: (line: SalesLine) => string): Map<string, SalesLine[]> {
  const parts = new Map<string, SalesLine[]>();
  for (const line of lines) {
    const key = keyOf(line);
    const part = parts.get(key);
    if (part) {
      part.push(line);
    } else {
      parts.set(key, [line]);
    }
  }
  return new Map([...parts].sort(([a], [b]) => compareText(a, b)));
}

function pivotRecord(row: PivotRow, days: string[]): SheetRecord {
  const record: SheetRecord = { Barcode: row.barcode, Produk: row.product };
  for (const day of days) {
    record[`Jumlah_${day}`] = row.quantities[day] ?? 0;
  }
  for (const day of days) {
    record[`Total_${day}`] = row.totals[day] ?? 0;
  }
  return record;
}

function totalRecord(label: string, days: string[], rows: PivotRow[]): SheetRecord {
  const record: SheetRecord = { Barcode: label, Produk: '' };
  for (const day of days) {
    record[`Jumlah_${day}`] = sum(rows.map((row) => row.quantities[day] ?? 0));
  }
  for (const day of days) {
    record[`Total_${day}`] = sum(rows.map((row) => row.totals[day] ?? 0));
  }
  return record;
}

function detailRecord(line: SalesLine, columns: string[]): SheetRecord {
  const record: SheetRecord = {};
  for (const column of columns) {
    record[column] =
      column === 'Order Date' ? formatReportDate(line.orderDate, 'yyyy-MM-dd, HH:mm') : (line.values[column] ?? null);
  }
  return record;
}

function orderTimeOf(line: SalesLine): string | null {
  const value = line.values['Order Time'];
  return value === null || value === undefined ? null : String(value);
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function compareText(a: string | null, b: string | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a < b ? -1 : 1;
}
