import { StreamableFile } from '@nestjs/common';
import { attachmentDisposition } from '../../common/utils/download.util';
import { XLSX_CONTENT_TYPE } from '../../common/utils/workbook.util';
import { SalesReportWorkbook } from '../interfaces/sales-report.interface';

export function archiveFile(content: Buffer, fileName: string): StreamableFile {
  return new StreamableFile(content, { type: 'application/zip', disposition: attachmentDisposition(fileName) });
}

export function workbookFile(workbook: SalesReportWorkbook): StreamableFile {
  return new StreamableFile(workbook.content, {
    type: XLSX_CONTENT_TYPE,
    disposition: attachmentDisposition(workbook.fileName),
  });
}
