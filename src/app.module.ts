import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { BullModule } from '@nestjs/bull';
import { CacheModule } from '@nestjs/cache-manager';
import { AppController } from './app.controller';
import appConfig, { AppSettings } from './config/app.config';
import authConfig from './config/auth.config';
import odooConfig from './config/odoo.config';
import { AuthModule } from './auth/auth.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { LogsModule } from './logs/logs.module';
import { OdooModule } from './odoo/odoo.module';
import { QueuesModule } from './queues/queues.module';
import { SalesModule } from './sales/sales.module';
import { SalesReportModule } from './sales-report/sales-report.module';
import { StockControlModule } from './stock-control/stock-control.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [odooConfig, authConfig, appConfig],
    }),
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        uri: configService.getOrThrow<AppSettings>('app').mongodbUri,
      }),
    }),
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        redis: configService.getOrThrow<AppSettings>('app').redis,
      }),
    }),
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ttl: configService.getOrThrow<AppSettings>('app').cacheTtlSeconds * 1000,
      }),
    }),
    LogsModule,
    OdooModule,
    AuthModule,
    SalesModule,
    DashboardModule,
    StockControlModule,
    SalesReportModule,
    QueuesModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
