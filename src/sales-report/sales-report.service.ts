import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { format } from 'date-fns';
import { SessionStore } from '../auth/session-store';
import { UploadedSheet } from '../common/interfaces/uploaded-file.interface';
import { errorMessage } from '../common/utils/error.util';
import { readWorkbook, uploadFormat } from '../common/utils/workbook.util';
import {
  SalesReport,
  SalesReportOptions,
  SalesReportSummary,
  SalesReportView,
  SalesReportWorkbook,
  SalesSheet,
} from './interfaces/sales-report.interface';
import { SALES_REPORTS } from './sales-report.constants';
import { buildBrandWorkbook, zipWorkbooks } from './utils/report-workbook.util';
import { dateLabel, groupByParentBrand, orderDateRange, sanitizeFileName, sortSalesLines } from './utils/sales-pivot.util';
import { formatReportDate, readSalesSheet } from './utils/sales-sheet.util';

/**
 * Splits a brand-ambassador sales export into one workbook per parent
 * brand and keeps the last report of every session for download.
 */
@Injectable()
export class SalesReportService {
  private readonly logger = new Logger(SalesReportService.name);

  constructor(@Inject(SALES_REPORTS) private readonly reports: SessionStore<SalesReport>) {}

  async generate(
    upload: UploadedSheet | undefined,
    options: SalesReportOptions,
    now: Date = new Date(),
  ): Promise<SalesReport> {
    if (!upload) {
      throw new BadRequestException('No sales workbook uploaded');
    }

    let sheet: SalesSheet;
    try {
      if (uploadFormat(upload.originalname) !== 'xlsx') {
        throw new Error('Upload the sales export as an .xlsx workbook');
      }
      sheet = readSalesSheet(await readWorkbook(upload.buffer));
    } catch (error) {
      throw new BadRequestException(errorMessage(error));
    }

    const lines = sortSalesLines(sheet.lines);
    const groups = groupByParentBrand(lines);

    const workbooks: SalesReportWorkbook[] = [];
    for (const group of groups) {
      const key = `${group.key}_${dateLabel(group.lines)}`;
      workbooks.push({
        key,
        fileName: `${sanitizeFileName(key)}.xlsx`,
        content: await buildBrandWorkbook(group, sheet.columns, options.separateByDate),
      });
    }

    const range = orderDateRange(lines);
    const parentBrands = [...new Set(groups.map((group) => group.parentBrand))].sort();
    const summary: SalesReportSummary = {
      totalRows: lines.length,
      parentBrandsCount: parentBrands.length,
      workbooksCount: workbooks.length,
      dateRange: {
        start: formatReportDate(range.start, 'yyyy-MM-dd'),
        end: formatReportDate(range.end, 'yyyy-MM-dd'),
      },
      parentBrands,
      workbookKeys: workbooks.map((workbook) => workbook.key).sort(),
    };

    this.logger.log(
      `Built ${workbooks.length} workbook(s) for ${parentBrands.length} parent brand(s) from ${lines.length} row(s) of ${upload.originalname}`,
    );
    return { summary, workbooks, createdAt: now };
  }

  remember(sessionId: string, report: SalesReport): void {
    this.reports.set(sessionId, report);
  }

  find(sessionId: string): SalesReport | undefined {
    return this.reports.get(sessionId);
  }

  current(sessionId: string): SalesReport {
    const report = this.find(sessionId);
    if (!report) {
      throw new NotFoundException('No sales report yet');
    }
    return report;
  }

  workbook(sessionId: string, key: string): SalesReportWorkbook {
    const workbook = this.current(sessionId).workbooks.find((candidate) => candidate.key === key);
    if (!workbook) {
      throw new NotFoundException(`Workbook ${key} not found`);
    }
    return workbook;
  }

  forget(sessionId: string): void {
    this.reports.delete(sessionId);
  }

  archive(report: SalesReport): Promise<Buffer> {
    return zipWorkbooks(report.workbooks);
  }
}

export function archiveFileName(report: SalesReport): string {
  return `Laporan Penjualan BA ${format(report.createdAt, 'ddMMyyyy')}.zip`;
}

export function reportView(report: SalesReport): SalesReportView {
  return {
    summary: report.summary,
    createdAt: report.createdAt.toISOString(),
    workbooks: report.workbooks.map(({ key, fileName, content }) => ({ key, fileName, size: content.length })),
  };
}
