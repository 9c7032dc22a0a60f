import archiver from 'archiver';
import { Border, Borders, Fill, Workbook } from 'exceljs';
import { SheetCell, SheetData, fitColumnWidths, workbookBuffer } from '../../common/utils/workbook.util';
import { BrandGroup, SalesReportWorkbook } from '../interfaces/sales-report.interface';
import {
  BRAND_TOTAL_SUFFIX,
  TOTAL_SELLOUT,
  detailedSheet,
  isSplitByBrand,
  linesByDay,
  pivotSheet,
} from './sales-pivot.util';

type ReportSheetKind = 'pivot' | 'detailed';

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFFF00' } };
const BRAND_TOTAL_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFF2F2F2' } };
const THIN: Partial<Border> = { style: 'thin', color: { argb: 'FF000000' } };
const THIN_BORDERS: Partial<Borders> = { top: THIN, left: THIN, bottom: THIN, right: THIN };
const BARCODE_COLUMNS = ['Barcode', 'Product/Barcode', 'Product Barcode'];
const MONEY_MARKERS = ['Tax Incl', 'Revenue', 'Amount', 'Price'];

const rupiah = new Intl.NumberFormat('id-ID', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatReportRupiah(value: number): string {
  return `Rp ${rupiah.format(value)}`;
}

export function isMoneyColumn(column: string): boolean {
  return column.startsWith('Total') || MONEY_MARKERS.some((marker) => column.includes(marker));
}

/**
 * `Pivoted` and `Detailed Report`, or one pair per day suffixed with the
 * day when the report is separated by date. Parents that are split by brand
 * get flat sheets; detailed sheets per day are always organised by brand.
 */
export async function buildBrandWorkbook(
  group: BrandGroup,
  columns: string[],
  separateByDate: boolean,
): Promise<Buffer> {
  const organizeByBrand = !isSplitByBrand(group.parentBrand);
  const workbook = new Workbook();

  if (separateByDate) {
    for (const [day, lines] of linesByDay(group.lines)) {
      addReportSheet(workbook, `Pivoted_${day}`, pivotSheet(lines, organizeByBrand), 'pivot');
      addReportSheet(workbook, `Detailed Report_${day}`, detailedSheet(columns, lines, true), 'detailed');
    }
  } else {
    addReportSheet(workbook, 'Pivoted', pivotSheet(group.lines, organizeByBrand), 'pivot');
    addReportSheet(workbook, 'Detailed Report', detailedSheet(columns, group.lines, organizeByBrand), 'detailed');
  }

  return workbookBuffer(workbook);
}

export function addReportSheet(workbook: Workbook, name: string, data: SheetData, kind: ReportSheetKind): void {
  const worksheet = workbook.addWorksheet(name);
  worksheet.addRow(data.columns);
  for (const record of data.rows) {
    worksheet.addRow(data.columns.map((column) => reportCell(column, record[column] ?? null)));
  }

  worksheet.getRow(1).eachCell((cell) => {
    cell.fill = HEADER_FILL;
    cell.font = { bold: true };
    cell.alignment = { horizontal: 'center' };
  });

  const textColumns = data.columns
    .map((column, index) => ({ column, number: index + 1 }))
    .filter(({ column }) => BARCODE_COLUMNS.includes(column) || isMoneyColumn(column));
  for (const { number } of textColumns) {
    worksheet.getColumn(number).eachCell((cell, rowNumber) => {
      if (rowNumber > 1) {
        cell.numFmt = '@';
      }
    });
  }

  const brandColumn = data.columns.indexOf('Brand') + 1;
  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }
    if (row.getCell(1).text.endsWith(TOTAL_SELLOUT)) {
      row.eachCell({ includeEmpty: true }, (cell) => {
        cell.font = { bold: true };
      });
    }
    if (kind === 'detailed' && brandColumn > 0 && row.getCell(brandColumn).text.endsWith(BRAND_TOTAL_SUFFIX)) {
      row.eachCell({ includeEmpty: true }, (cell) => {
        cell.font = { bold: true };
        cell.fill = BRAND_TOTAL_FILL;
      });
    }
  });

  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    for (let columnNumber = 1; columnNumber <= data.columns.length; columnNumber++) {
      row.getCell(columnNumber).border = THIN_BORDERS;
    }
  }

  fitColumnWidths(worksheet);
}

export function zipWorkbooks(workbooks: SalesReportWorkbook[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const archive = archiver('zip', { zlib: { level: 9 } });
    const chunks: Buffer[] = [];

    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);

    for (const workbook of workbooks) {
      archive.append(workbook.content, { name: workbook.fileName });
    }
    archive.finalize().catch(reject);
  });
}

/** Money becomes Rupiah text, barcodes text, blanks empty cells. */
function reportCell(column: string, value: SheetCell): SheetCell {
  if (value === '' || value === null) {
    return null;
  }
  if (BARCODE_COLUMNS.includes(column)) {
    return String(value);
  }
  if (isMoneyColumn(column)) {
    const amount = typeof value === 'string' ? Number(value) : value;
    if (typeof amount === 'number' && Number.isFinite(amount)) {
      return formatReportRupiah(amount);
    }
  }
  return value;
}
