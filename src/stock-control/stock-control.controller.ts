import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { UploadedSheet } from '../common/interfaces/uploaded-file.interface';
import { ReconcileOptionsDto } from './dto/reconcile-options.dto';
import { ReconcileResult } from './interfaces/stock-control.interface';
import { StockControlService } from './stock-control.service';
import { combinedCsvFile, combinedXlsxFile } from './utils/stock-download.util';

export interface StockUploads {
  files?: UploadedSheet[];
  'files[]'?: UploadedSheet[];
  reference?: UploadedSheet[];
}

const MAX_SHEETS = 50;

export const stockUploadFields = FileFieldsInterceptor([
  { name: 'files', maxCount: MAX_SHEETS },
  { name: 'files[]', maxCount: MAX_SHEETS },
  { name: 'reference', maxCount: 1 },
]);

@Controller('stock-control')
export class StockControlController {
  constructor(private readonly stockControlService: StockControlService) {}

  @Post('reconcile')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(stockUploadFields)
  reconcile(@UploadedFiles() uploads: StockUploads | undefined, @Body() options: ReconcileOptionsDto): Promise<ReconcileResult> {
    return reconcileUploads(this.stockControlService, uploads, options);
  }

  @Post('reconcile.csv')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(stockUploadFields)
  async downloadCsv(
    @UploadedFiles() uploads: StockUploads | undefined,
    @Body() options: ReconcileOptionsDto,
  ): Promise<StreamableFile> {
    return combinedCsvFile(await reconcileUploads(this.stockControlService, uploads, options));
  }

  @Post('reconcile.xlsx')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(stockUploadFields)
  async downloadXlsx(
    @UploadedFiles() uploads: StockUploads | undefined,
    @Body() options: ReconcileOptionsDto,
  ): Promise<StreamableFile> {
    return combinedXlsxFile(await reconcileUploads(this.stockControlService, uploads, options));
  }
}

export async function reconcileUploads(
  service: StockControlService,
  uploads: StockUploads | undefined,
  options: ReconcileOptionsDto,
): Promise<ReconcileResult> {
  const sheets = [...(uploads?.files ?? []), ...(uploads?.['files[]'] ?? [])];
  if (sheets.length === 0) {
    throw new BadRequestException('No data could be read from files');
  }

  return service.reconcile(sheets, uploads?.reference?.[0], {
    sort: options.sort,
    includeSource: options.includeSource,
  });
}
