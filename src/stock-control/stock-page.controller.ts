import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpStatus,
  Inject,
  NotFoundException,
  Post,
  Req,
  Res,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthService } from '../auth/auth.service';
import { Public } from '../auth/decorators/public.decorator';
import { SessionId } from '../auth/decorators/session-id.decorator';
import { SessionStore } from '../auth/session-store';
import { TemplateRenderer } from '../common/templates/template.renderer';
import { ReconcileOptionsDto } from './dto/reconcile-options.dto';
import { ReconcileResult, STOCK_SORT_OPTIONS } from './interfaces/stock-control.interface';
import { STOCK_RESULTS } from './stock-control.constants';
import { reconcileUploads, StockUploads, stockUploadFields } from './stock-control.controller';
import { StockControlService } from './stock-control.service';
import { combinedCsvFile, combinedXlsxFile } from './utils/stock-download.util';

export const STOCK_PREVIEW_ROWS = 200;

/** Upload form and last reconciliation of the session, with downloads. */
@Controller('stock')
export class StockPageController {
  constructor(
    private readonly authService: AuthService,
    private readonly stockControlService: StockControlService,
    private readonly renderer: TemplateRenderer,
    @Inject(STOCK_RESULTS) private readonly results: SessionStore<ReconcileResult>,
  ) {}

  @Public()
  @Get()
  async page(@Req() req: Request, @Res() res: Response) {
    const session = await this.authService.resolveSession(req);
    if (!session) {
      res.redirect(HttpStatus.SEE_OTHER, '/login');
      return;
    }
    res.type('html').send(this.render(this.results.get(session.sid)));
  }

  @Post()
  @UseInterceptors(stockUploadFields)
  async upload(
    @SessionId() sessionId: string,
    @UploadedFiles() uploads: StockUploads | undefined,
    @Body() options: ReconcileOptionsDto,
    @Res() res: Response,
  ) {
    try {
      this.results.set(sessionId, await reconcileUploads(this.stockControlService, uploads, options));
    } catch (error) {
      if (!(error instanceof BadRequestException)) {
        throw error;
      }
      res.status(HttpStatus.BAD_REQUEST).type('html').send(this.render(undefined, error.message, options));
      return;
    }
    res.redirect(HttpStatus.SEE_OTHER, '/stock');
  }

  @Get('combined.csv')
  downloadCsv(@SessionId() sessionId: string): StreamableFile {
    return combinedCsvFile(this.stored(sessionId));
  }

  @Get('combined.xlsx')
  downloadXlsx(@SessionId() sessionId: string): Promise<StreamableFile> {
    return combinedXlsxFile(this.stored(sessionId));
  }

  @Post('clear')
  clear(@SessionId() sessionId: string, @Res() res: Response) {
    this.results.delete(sessionId);
    res.redirect(HttpStatus.SEE_OTHER, '/stock');
  }

  private stored(sessionId: string): ReconcileResult {
    const result = this.results.get(sessionId);
    if (!result) {
      throw new NotFoundException('No reconciled stock data yet');
    }
    return result;
  }

  private render(result: ReconcileResult | undefined, error?: string, options?: ReconcileOptionsDto): string {
    return this.renderer.render('stock-control', {
      error,
      sort: options?.sort ?? 'Urgency',
      includeSource: options?.includeSource ?? true,
      sortOptions: STOCK_SORT_OPTIONS,
      result: result && {
        metrics: result.metrics,
        statusAnalysis: result.statusAnalysis,
        columns: result.columns,
        rows: result.rows.slice(0, STOCK_PREVIEW_ROWS),
        truncated: result.rows.length > STOCK_PREVIEW_ROWS,
      },
    });
  }
}
