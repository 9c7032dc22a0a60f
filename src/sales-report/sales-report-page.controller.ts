import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpStatus,
  Post,
  Req,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthService } from '../auth/auth.service';
import { Public } from '../auth/decorators/public.decorator';
import { SessionId } from '../auth/decorators/session-id.decorator';
import { UploadedSheet } from '../common/interfaces/uploaded-file.interface';
import { TemplateRenderer } from '../common/templates/template.renderer';
import { SalesReportOptionsDto } from './dto/sales-report-options.dto';
import { SalesReport } from './interfaces/sales-report.interface';
import { salesUploadField } from './sales-report.controller';
import { archiveFileName, SalesReportService } from './sales-report.service';

/** Upload form for the BA sales export and the session's last report. */
@Controller('ba-report')
export class SalesReportPageController {
  constructor(
    private readonly authService: AuthService,
    private readonly salesReportService: SalesReportService,
    private readonly renderer: TemplateRenderer,
  ) {}

  @Public()
  @Get()
  async page(@Req() req: Request, @Res() res: Response) {
    const session = await this.authService.resolveSession(req);
    if (!session) {
      res.redirect(HttpStatus.SEE_OTHER, '/login');
      return;
    }
    res.type('html').send(this.render(this.salesReportService.find(session.sid)));
  }

  @Post()
  @UseInterceptors(salesUploadField)
  async upload(
    @SessionId() sessionId: string,
    @UploadedFile() file: UploadedSheet | undefined,
    @Body() options: SalesReportOptionsDto,
    @Res() res: Response,
  ) {
    try {
      const report = await this.salesReportService.generate(file, { separateByDate: options.separateByDate });
      this.salesReportService.remember(sessionId, report);
    } catch (error) {
      if (!(error instanceof BadRequestException)) {
        throw error;
      }
      res.status(HttpStatus.BAD_REQUEST).type('html').send(this.render(undefined, error.message, options));
      return;
    }
    res.redirect(HttpStatus.SEE_OTHER, '/ba-report');
  }

  @Post('clear')
  clear(@SessionId() sessionId: string, @Res() res: Response) {
    this.salesReportService.forget(sessionId);
    res.redirect(HttpStatus.SEE_OTHER, '/ba-report');
  }

  private render(report: SalesReport | undefined, error?: string, options?: SalesReportOptionsDto): string {
    return this.renderer.render('sales-report', {
      error,
      separateByDate: options?.separateByDate ?? false,
      report: report && {
        summary: report.summary,
        archiveName: archiveFileName(report),
        workbooks: report.workbooks.map(({ key, fileName, content }) => ({
          fileName,
          href: `/sales-report/workbooks/${encodeURIComponent(key)}`,
          size: content.length,
        })),
      },
    });
  }
}
