import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';
import { toBoolean } from '../../common/utils/form.util';

export class SalesReportOptionsDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  separateByDate: boolean = false;
}
