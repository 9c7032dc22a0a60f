import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Log, LogDocument, LogStatus } from './schemas/log.schema';

export interface CreateLogDto {
  service: string;
  action: string;
  status: LogStatus;
  request?: Record<string, unknown>;
  response?: unknown;
  metadata?: Record<string, unknown>;
  errorMessage?: string;
  duration?: number;
}

export interface LogFilters {
  service?: string;
  action?: string;
  status?: LogStatus;
}

export const LOG_QUERY_LIMIT = 100;

@Injectable()
export class LogsService {
  constructor(@InjectModel(Log.name) private readonly logModel: Model<LogDocument>) {}

  async create(createLogDto: CreateLogDto): Promise<Log> {
    const log = new this.logModel(createLogDto);
    return log.save();
  }

  async findAll(filters: LogFilters = {}): Promise<Log[]> {
    const query: FilterQuery<LogDocument> = {};
    if (filters.service) {
      query.service = filters.service;
    }
    if (filters.action) {
      query.action = filters.action;
    }
    if (filters.status) {
      query.status = filters.status;
    }

    return this.logModel.find(query).sort({ createdAt: -1 }).limit(LOG_QUERY_LIMIT).exec();
  }

  async findById(id: string): Promise<Log | null> {
    return this.logModel.findById(id).exec();
  }
}
