import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { formatInTimeZone } from 'date-fns-tz';
import { Workbook } from 'exceljs';
import { UploadedSheet } from '../../common/interfaces/uploaded-file.interface';
import {
  fitColumnWidths,
  readWorkbook,
  SheetCell,
  SheetData,
  uploadFormat,
  workbookBuffer,
} from '../../common/utils/workbook.util';
import { CellValue, StockRow, StockTable } from '../interfaces/stock-control.interface';

/** Columns read as numbers; a blank cell counts as 0. */
export const NUMERIC_COLUMNS = ['Quantity', 'Product/Quantity On Hand'];
/** Read as text even when the workbook stores them as numbers. */
export const TEXT_COLUMNS = ['Barcode'];

export const COMBINED_SHEET_NAME = 'Combined Data';

export async function readStockSheet(sheet: UploadedSheet): Promise<StockTable> {
  switch (uploadFormat(sheet.originalname)) {
    case 'csv':
      return readCsvSheet(sheet.buffer);
    case 'xlsx':
      return toStockTable(await readWorkbook(sheet.buffer));
  }
}

export function readCsvSheet(content: Buffer | string): StockTable {
  let header: string[] = [];
  const records: unknown = parse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names.map((name) => name.trim());
      return header;
    },
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  if (!Array.isArray(records)) {
    return { columns: header, rows: [] };
  }

  return toStockTable({
    columns: header,
    rows: records.map((record: unknown) => {
      const row: Record<string, SheetCell> = {};
      for (const column of header) {
        const raw = isRecord(record) ? record[column] : undefined;
        row[column] = typeof raw === 'string' ? raw : null;
      }
      return row;
    }),
  });
}

export function writeCsvSheet(table: StockTable): string {
  return stringify(
    table.rows.map((row) => table.columns.map((column) => row[column] ?? '')),
    { header: true, columns: table.columns },
  );
}

export async function writeXlsxSheet(table: StockTable): Promise<Buffer> {
  const workbook = new Workbook();
  const worksheet = workbook.addWorksheet(COMBINED_SHEET_NAME);

  worksheet.addRow(table.columns);
  for (const row of table.rows) {
    worksheet.addRow(table.columns.map((column) => blankToNull(row[column])));
  }
  worksheet.getRow(1).font = { bold: true };
  fitColumnWidths(worksheet);

  return workbookBuffer(workbook);
}

function blankToNull(value: CellValue | undefined): CellValue | null {
  return value === undefined || value === '' ? null : value;
}

function toStockTable(data: SheetData): StockTable {
  const rows = data.rows.map((record, index) => {
    const row: StockRow = {};
    for (const column of data.columns) {
      row[column] = toStockCell(column, record[column] ?? null, index + 2);
    }
    return row;
  });
  return { columns: data.columns, rows };
}

function toStockCell(column: string, value: SheetCell, line: number): CellValue {
  if (NUMERIC_COLUMNS.includes(column)) {
    return toNumber(value, column, line);
  }
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    // Workbook dates carry the wall-clock time in UTC fields.
    return formatInTimeZone(value, 'UTC', 'yyyy-MM-dd HH:mm:ss');
  }
  if (typeof value === 'boolean' || TEXT_COLUMNS.includes(column)) {
    return String(value);
  }
  return value;
}

function toNumber(value: SheetCell, column: string, line: number): number {
  if (value === null || value === '') {
    return 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  const number = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(number)) {
    throw new Error(`${column} on line ${line} is not a number: "${String(value)}"`);
  }
  return number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
