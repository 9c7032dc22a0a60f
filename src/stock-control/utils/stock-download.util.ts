import { StreamableFile } from '@nestjs/common';
import { format } from 'date-fns';
import { attachmentDisposition } from '../../common/utils/download.util';
import { XLSX_CONTENT_TYPE } from '../../common/utils/workbook.util';
import { StockTable } from '../interfaces/stock-control.interface';
import { writeCsvSheet, writeXlsxSheet } from './stock-sheet.util';

export function combinedFileName(extension: 'csv' | 'xlsx', now: Date = new Date()): string {
  return `combined_${format(now, 'yyyyMMdd_HHmmss')}.${extension}`;
}

export function combinedCsvFile(table: StockTable): StreamableFile {
  return new StreamableFile(Buffer.from(writeCsvSheet(table), 'utf8'), {
    type: 'text/csv; charset=utf-8',
    disposition: attachmentDisposition(combinedFileName('csv')),
  });
}

export async function combinedXlsxFile(table: StockTable): Promise<StreamableFile> {
  return new StreamableFile(await writeXlsxSheet(table), {
    type: XLSX_CONTENT_TYPE,
    disposition: attachmentDisposition(combinedFileName('xlsx')),
  });
}
