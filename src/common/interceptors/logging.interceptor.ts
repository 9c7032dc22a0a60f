import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
  StreamableFile,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { CreateLogDto, LogsService } from '../../logs/logs.service';
import { errorMessage, errorStack } from '../utils/error.util';

const REDACTED_FIELDS = ['password', 'accessToken'];

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  constructor(private readonly logsService: LogsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, originalUrl: url, headers } = request;
    const startTime = Date.now();
    const action = `${method} ${request.route?.path ?? url}`;
    const requestData = {
      method,
      url,
      body: redact(request.body),
      query: request.query,
    };
    const metadata = {
      userAgent: headers['user-agent'],
      ip: request.ip,
    };

    this.logger.log(`Incoming Request: ${method} ${url}`);

    return next.handle().pipe(
      tap({
        next: (responseData: unknown) => {
          const duration = Date.now() - startTime;

          this.record({
            service: 'api',
            action,
            status: 'success',
            request: requestData,
            response: responseData instanceof StreamableFile ? { file: true } : redact(responseData),
            metadata,
            duration,
          });

          this.logger.log(`Response: ${method} ${url} - ${duration}ms`);
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;

          this.record({
            service: 'api',
            action,
            status: 'error',
            request: requestData,
            errorMessage: errorMessage(error),
            metadata: { ...metadata, stack: errorStack(error) },
            duration,
          });

          this.logger.error(`Error: ${method} ${url} - ${errorMessage(error)} - ${duration}ms`);
        },
      }),
    );
  }

  private record(entry: CreateLogDto): void {
    this.logsService.create(entry).catch((error: unknown) => {
      this.logger.error(`Failed to log request: ${errorMessage(error)}`);
    });
  }
}

/**
 * Copies plain objects with secret fields masked. Values that serialise
 * themselves (Mongoose documents, ObjectIds) are copied by their JSON form.
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (typeof value !== 'object' || value === null || value instanceof Date) {
    return value;
  }
  if (hasToJSON(value)) {
    return redact(value.toJSON());
  }
  if (!isPlainObject(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [key, REDACTED_FIELDS.includes(key) ? '[REDACTED]' : redact(field)]),
  );
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
