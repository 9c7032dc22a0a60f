import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsOptional } from 'class-validator';
import { toBoolean } from '../../common/utils/form.util';
import { STOCK_SORT_OPTIONS, StockSortOption } from '../interfaces/stock-control.interface';

export class ReconcileOptionsDto {
  @IsOptional()
  @IsIn(STOCK_SORT_OPTIONS)
  sort: StockSortOption = 'Urgency';

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  includeSource: boolean = true;
}
