import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { UploadedSheet } from '../common/interfaces/uploaded-file.interface';
import { errorMessage } from '../common/utils/error.util';
import {
  ReconcileOptions,
  ReconcileResult,
  StatusBreakdown,
  StockMetrics,
  StockRow,
  StockTable,
} from './interfaces/stock-control.interface';
import { readStockSheet } from './utils/stock-sheet.util';

export const SOURCE_COLUMN = 'Source_File';
export const STATUS_COLUMN = 'Status';
export const MAX_RECHECK_AREA = 6;

const RENAMES: Record<string, string> = {
  Quantity: 'Gudang',
  'Product/Quantity On Hand': 'Sistem',
};

const URGENCY_RANK: Record<string, number> = { URGENT: 2, Recheck: 1 };

/**
 * Merges warehouse count sheets, compares them with the system quantity
 * and flags items against a recent-sales reference sheet.
 */
@Injectable()
export class StockControlService {
  private readonly logger = new Logger(StockControlService.name);

  async reconcile(
    sheets: UploadedSheet[],
    reference: UploadedSheet | undefined,
    options: ReconcileOptions,
  ): Promise<ReconcileResult> {
    let table = this.transform(await this.combine(sheets, options.includeSource));

    if (options.sort === 'Brand/Name') {
      table = sortByBrandAndName(table);
    }
    if (reference) {
      table = await this.applyReference(table, reference);
    }
    if (options.sort === 'Urgency') {
      table = sortByUrgency(table);
    }

    this.logger.log(`Reconciled ${sheets.length} sheet(s) into ${table.rows.length} row(s)`);

    return {
      ...table,
      metrics: stockMetrics(table),
      statusAnalysis: statusAnalysis(table),
    };
  }

  async combine(sheets: UploadedSheet[], includeSource: boolean): Promise<StockTable> {
    const columns: string[] = [];
    const rows: StockRow[] = [];

    for (const sheet of sheets) {
      let table: StockTable;
      try {
        table = await readStockSheet(sheet);
      } catch (error) {
        throw new BadRequestException(`Error processing ${sheet.originalname}: ${errorMessage(error)}`);
      }

      const sheetColumns = includeSource ? [...table.columns, SOURCE_COLUMN] : table.columns;
      for (const column of sheetColumns) {
        if (!columns.includes(column)) {
          columns.push(column);
        }
      }

      const source = sourceName(sheet.originalname);
      for (const row of table.rows) {
        rows.push(includeSource ? { ...row, [SOURCE_COLUMN]: source } : row);
      }
    }

    if (rows.length === 0) {
      throw new BadRequestException('No data could be read from files');
    }

    return {
      columns,
      rows: rows.map((row) => Object.fromEntries(columns.map((column) => [column, row[column] ?? '']))),
    };
  }

  transform(table: StockTable): StockTable {
    let columns = table.columns.map((column) => RENAMES[column] ?? column);
    let rows = table.rows.map((row) => {
      const renamed: StockRow = {};
      for (const [column, value] of Object.entries(row)) {
        renamed[RENAMES[column] ?? column] = value;
      }
      return renamed;
    });

    if (columns.includes('Gudang')) {
      rows = rows.filter((row) => numeric(row.Gudang) !== 0);

      if (columns.includes('Sistem')) {
        columns = insertAfter(columns, 'Gudang', 'Area');
        rows = rows.map((row) => ({ ...row, Area: numeric(row.Sistem) - numeric(row.Gudang) }));
      }
    }

    if (columns.includes('Barcode')) {
      rows = rows.map((row) => ({ ...row, Barcode: cleanBarcode(row.Barcode) }));
    }

    if (columns.includes('Product/Product Category')) {
      rows = rows.map((row) => ({ ...row, 'Product/Product Category': lastCategory(row['Product/Product Category']) }));
    }

    return { columns, rows };
  }

  async applyReference(table: StockTable, reference: UploadedSheet): Promise<StockTable> {
    if (!table.columns.includes('Barcode')) {
      return table;
    }

    let referenceTable: StockTable;
    try {
      referenceTable = await readStockSheet(reference);
    } catch (error) {
      throw new BadRequestException(`Error processing reference file: ${errorMessage(error)}`);
    }

    if (!referenceTable.columns.includes('Barcode') || !referenceTable.columns.includes('Quantity')) {
      this.logger.warn(`Reference ${reference.originalname} has no Barcode and Quantity columns; skipping lookup`);
      return table;
    }

    const known = new Set(referenceTable.rows.map((row) => String(row.Barcode).trim()));
    const hasArea = table.columns.includes('Area');

    const rows = table.rows
      .map((row): StockRow & { Barcode: string } => ({ ...row, Barcode: String(row.Barcode).trim() }))
      .filter((row) => !hasArea || numeric(row.Area) <= MAX_RECHECK_AREA)
      .map((row): StockRow => {
        let status = '';
        if (!known.has(row.Barcode)) {
          status = hasArea && numeric(row.Area) === 0 ? 'URGENT' : 'Recheck';
        }
        return { ...row, [STATUS_COLUMN]: status };
      });

    const columns = table.columns.filter((column) => column !== STATUS_COLUMN);
    const sourceIndex = columns.indexOf(SOURCE_COLUMN);
    if (sourceIndex === -1) {
      columns.push(STATUS_COLUMN);
    } else {
      columns.splice(sourceIndex, 0, STATUS_COLUMN);
    }

    return { columns, rows };
  }
}

export function sortByBrandAndName(table: StockTable): StockTable {
  const keys = ['Product/Brand', 'Product/Name'].filter((column) => table.columns.includes(column));
  if (keys.length === 0) {
    return table;
  }

  const rows = [...table.rows].sort((a, b) => {
    for (const key of keys) {
      const left = String(a[key]);
      const right = String(b[key]);
      if (left !== right) {
        return left < right ? -1 : 1;
      }
    }
    return 0;
  });
  return { columns: table.columns, rows };
}

export function sortByUrgency(table: StockTable): StockTable {
  if (!table.columns.includes(STATUS_COLUMN)) {
    return table;
  }
  const rank = (row: StockRow) => URGENCY_RANK[String(row[STATUS_COLUMN])] ?? 0;
  return { columns: table.columns, rows: [...table.rows].sort((a, b) => rank(b) - rank(a)) };
}

export function stockMetrics(table: StockTable): StockMetrics {
  const hasArea = table.columns.includes('Area');
  const hasStatus = table.columns.includes(STATUS_COLUMN);

  return {
    totalRows: table.rows.length,
    totalColumns: table.columns.length,
    maxArea: hasArea && table.rows.length > 0 ? maxOf(table.rows.map((row) => numeric(row.Area))) : null,
    urgentCount: hasStatus ? table.rows.filter((row) => row[STATUS_COLUMN] === 'URGENT').length : null,
  };
}

export function statusAnalysis(table: StockTable): StatusBreakdown[] | null {
  if (!table.columns.includes(STATUS_COLUMN)) {
    return null;
  }

  const counts = new Map<string, number>();
  for (const row of table.rows) {
    const status = String(row[STATUS_COLUMN]);
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([, a], [, b]) => b - a)
    .map(([status, count]) => ({
      status: status || 'Found',
      count,
      percentage: (count / table.rows.length) * 100,
    }));
}

function sourceName(fileName: string): string {
  return fileName.replace(/\.(csv|xlsx|xls)$/i, '');
}

function maxOf(values: number[]): number {
  return values.reduce((max, value) => (value > max ? value : max), -Infinity);
}

function insertAfter(columns: string[], anchor: string, column: string): string[] {
  const result = columns.filter((name) => name !== column);
  result.splice(result.indexOf(anchor) + 1, 0, column);
  return result;
}

function numeric(value: StockRow[string] | undefined): number {
  const number = Number(value);
  return Number.isFinite(number) ? number : 0;
}

function cleanBarcode(value: StockRow[string] | undefined): string {
  const text = value === undefined ? '' : String(value);
  return text === 'nan' ? '' : text;
}

function lastCategory(value: StockRow[string] | undefined): StockRow[string] {
  if (typeof value !== 'string' || !value.includes('/')) {
    return value ?? '';
  }
  const segments = value.split('/');
  return segments[segments.length - 1].trim();
}
