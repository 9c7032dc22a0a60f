import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import cookieParser from 'cookie-parser';
import { AppModule } from './app.module';
import { AppSettings } from './config/app.config';
import { OdooExceptionFilter } from './common/filters/odoo-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { LogsService } from './logs/logs.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');
  const settings = app.get(ConfigService).getOrThrow<AppSettings>('app');

  app.use(cookieParser());

  // `*` reflects the request origin.
  app.enableCors({
    origin: settings.corsOrigin === '*' ? true : settings.corsOrigin.split(',').map((origin) => origin.trim()),
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new OdooExceptionFilter());

  const logsService = app.get(LogsService);
  app.useGlobalInterceptors(new LoggingInterceptor(logsService));

  app.enableShutdownHooks();

  await app.listen(settings.port);

  logger.log(`Sales dashboard running on: http://localhost:${settings.port}`);
  logger.log(`Logs endpoint: http://localhost:${settings.port}/logs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
