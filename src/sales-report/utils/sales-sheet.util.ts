import { isValid } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { SheetCell, SheetData } from '../../common/utils/workbook.util';
import { REQUIRED_SALES_COLUMNS, SalesLine, SalesSheet } from '../interfaces/sales-report.interface';

/** Workbook dates hold wall-clock time in their UTC fields. */
export const REPORT_TIME_ZONE = 'UTC';

const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const DAY_MS = 86_400_000;
const DATE_TEXT = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2})?))?$/;

export function formatReportDate(date: Date, pattern: string): string {
  return formatInTimeZone(date, REPORT_TIME_ZONE, pattern);
}

/**
 * Checks the required columns and parses every row. Rows without a
 * readable order date or barcode are dropped; unreadable amounts count as 0.
 */
export function readSalesSheet(data: SheetData): SalesSheet {
  const missing = REQUIRED_SALES_COLUMNS.filter((column) => !data.columns.includes(column));
  if (missing.length > 0) {
    throw new Error(`Missing required columns: ${missing.join(', ')}`);
  }

  const lines: SalesLine[] = [];
  for (const record of data.rows) {
    const orderDate = parseOrderDate(record['Order Date'] ?? null);
    const barcode = textOf(record['Product/Barcode'] ?? null);
    if (!orderDate || barcode === null) {
      continue;
    }

    const quantity = numberOf(record.Quantity ?? null);
    const taxIncluded = numberOf(record['Tax Incl.'] ?? null);
    lines.push({
      orderDate,
      barcode,
      product: textOf(record.Product ?? null) ?? '',
      parentBrand: textOf(record['Parent Brand'] ?? null),
      brand: textOf(record.Brand ?? null),
      quantity,
      taxIncluded,
      values: {
        ...record,
        'Order Date': orderDate,
        'Product/Barcode': barcode,
        Quantity: quantity,
        'Tax Incl.': taxIncluded,
      },
    });
  }

  if (lines.length === 0) {
    throw new Error('No valid data found in the file');
  }
  return { columns: data.columns, lines };
}

/** Accepts workbook dates, Excel serial numbers and `yyyy-MM-dd[ HH:mm[:ss]]` text. */
export function parseOrderDate(value: SheetCell): Date | null {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = new Date(Math.round((value - EXCEL_EPOCH_OFFSET_DAYS) * DAY_MS));
  } else if (typeof value === 'string') {
    const match = DATE_TEXT.exec(value.trim());
    if (!match) {
      return null;
    }
    const [, day, time = '00:00'] = match;
    date = new Date(`${day}T${time}Z`);
    if (isValid(date) && formatReportDate(date, 'yyyy-MM-dd') !== day) {
      return null;
    }
  } else {
    return null;
  }
  return isValid(date) ? date : null;
}

function textOf(value: SheetCell): string | null {
  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return formatReportDate(value, 'yyyy-MM-dd HH:mm:ss');
  }
  const text = String(value).trim();
  return text === '' ? null : text;
}

function numberOf(value: SheetCell): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const number = Number(value);
    return Number.isFinite(number) ? number : 0;
  }
  return 0;
}
