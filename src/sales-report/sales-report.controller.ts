import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { SessionId } from '../auth/decorators/session-id.decorator';
import { UploadedSheet } from '../common/interfaces/uploaded-file.interface';
import { SalesReportOptionsDto } from './dto/sales-report-options.dto';
import { SalesReportView } from './interfaces/sales-report.interface';
import { archiveFileName, reportView, SalesReportService } from './sales-report.service';
import { archiveFile, workbookFile } from './utils/report-download.util';

export const salesUploadField = FileInterceptor('file');

@Controller('sales-report')
export class SalesReportController {
  constructor(private readonly salesReportService: SalesReportService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(salesUploadField)
  async generate(
    @SessionId() sessionId: string,
    @UploadedFile() file: UploadedSheet | undefined,
    @Body() options: SalesReportOptionsDto,
  ): Promise<SalesReportView> {
    const report = await this.salesReportService.generate(file, { separateByDate: options.separateByDate });
    this.salesReportService.remember(sessionId, report);
    return reportView(report);
  }

  @Get()
  current(@SessionId() sessionId: string): SalesReportView {
    return reportView(this.salesReportService.current(sessionId));
  }

  @Get('archive')
  async archive(@SessionId() sessionId: string): Promise<StreamableFile> {
    const report = this.salesReportService.current(sessionId);
    return archiveFile(await this.salesReportService.archive(report), archiveFileName(report));
  }

  @Get('workbooks/:key')
  workbook(@SessionId() sessionId: string, @Param('key') key: string): StreamableFile {
    return workbookFile(this.salesReportService.workbook(sessionId, key));
  }

  @Delete()
  clear(@SessionId() sessionId: string): { cleared: true } {
    this.salesReportService.forget(sessionId);
    return { cleared: true };
  }
}
