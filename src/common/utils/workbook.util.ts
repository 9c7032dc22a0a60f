import { CellValue, Workbook, Worksheet } from 'exceljs';
import { Readable } from 'stream';

export type SheetCell = string | number | boolean | Date | null;
export type SheetRecord = Record<string, SheetCell>;

export interface SheetData {
  columns: string[];
  rows: SheetRecord[];
}

export type UploadFormat = 'csv' | 'xlsx';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const MAX_COLUMN_WIDTH = 50;

export function uploadFormat(fileName: string): UploadFormat {
  const extension = /\.([^.]+)$/.exec(fileName)?.[1]?.toLowerCase();
  switch (extension) {
    case 'csv':
      return 'csv';
    case 'xlsx':
      return 'xlsx';
    case 'xls':
      throw new Error('Legacy .xls workbooks are not supported, save the file as .xlsx');
    default:
      throw new Error(`Unsupported file type: ${fileName}`);
  }
}

/**
 * Reads the first worksheet. Row 1 holds the column names; rows without
 * any value are skipped.
 */
export async function readWorkbook(content: Buffer): Promise<SheetData> {
  const workbook = new Workbook();
  await workbook.xlsx.read(Readable.from(content));

  const worksheet = workbook.worksheets.at(0);
  if (!worksheet) {
    throw new Error('Workbook has no sheets');
  }

  const header = new Map<number, string>();
  worksheet.getRow(1).eachCell((cell, columnNumber) => {
    const name = String(toSheetCell(cell.value) ?? '').trim();
    if (name !== '') {
      header.set(columnNumber, name);
    }
  });

  const rows: SheetRecord[] = [];
  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }

    const record: SheetRecord = {};
    let filled = false;
    for (const [columnNumber, name] of header) {
      const value = toSheetCell(row.getCell(columnNumber).value);
      record[name] = value;
      if (value !== null && value !== '') {
        filled = true;
      }
    }
    if (filled) {
      rows.push(record);
    }
  });

  return { columns: [...header.values()], rows };
}

/** Formula cells yield their cached result, rich text its plain text. */
export function toSheetCell(value: CellValue): SheetCell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'object' || value instanceof Date) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('result' in value && value.result !== undefined) {
    return toSheetCell(value.result);
  }
  return null;
}

export async function workbookBuffer(workbook: Workbook): Promise<Buffer> {
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export function fitColumnWidths(worksheet: Worksheet): void {
  for (let index = 1; index <= worksheet.columnCount; index++) {
    const column = worksheet.getColumn(index);
    let width = 0;
    column.eachCell({ includeEmpty: true }, (cell) => {
      width = Math.max(width, cell.text.length);
    });
    column.width = Math.min(width + 2, MAX_COLUMN_WIDTH);
  }
}
