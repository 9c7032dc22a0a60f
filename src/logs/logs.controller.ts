import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { isValidObjectId } from 'mongoose';
import { LogsService } from './logs.service';
import { LogQueryDto } from './dto/log-query.dto';

@Controller('logs')
export class LogsController {
  constructor(private readonly logsService: LogsService) {}

  @Get()
  async findAll(@Query() query: LogQueryDto) {
    return this.logsService.findAll(query);
  }

  @Get(':id')
  async findById(@Param('id') id: string) {
    const log = isValidObjectId(id) ? await this.logsService.findById(id) : null;
    if (!log) {
      throw new NotFoundException(`Log ${id} not found`);
    }
    return log;
  }
}
