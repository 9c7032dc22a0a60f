import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type LogDocument = HydratedDocument<Log>;

export const LOG_STATUSES = ['success', 'error', 'pending'] as const;
export type LogStatus = (typeof LOG_STATUSES)[number];

@Schema({ timestamps: true })
export class Log {
  @Prop({ required: true, index: true })
  service!: string; // 'odoo', 'api', 'scheduler'

  @Prop({ required: true })
  action!: string; // 'search_read', 'GET /dashboard', 'health-check', ...

  @Prop({ required: true, enum: LOG_STATUSES })
  status!: LogStatus;

  @Prop({ type: Object })
  request?: Record<string, unknown>;

  @Prop({ type: Object })
  response?: unknown;

  @Prop({ type: Object })
  metadata?: Record<string, unknown>;

  @Prop()
  errorMessage?: string;

  @Prop()
  duration?: number; // ms

  createdAt?: Date;
}

export const LogSchema = SchemaFactory.createForClass(Log);
