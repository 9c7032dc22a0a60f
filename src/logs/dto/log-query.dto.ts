import { IsIn, IsOptional, IsString } from 'class-validator';
import { LOG_STATUSES, LogStatus } from '../schemas/log.schema';

export class LogQueryDto {
  @IsOptional()
  @IsString()
  service?: string;

  @IsOptional()
  @IsString()
  action?: string;

  @IsOptional()
  @IsIn(LOG_STATUSES)
  status?: LogStatus;
}
