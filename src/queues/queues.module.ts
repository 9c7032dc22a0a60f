import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { LogsModule } from '../logs/logs.module';
import { OdooModule } from '../odoo/odoo.module';
import { ODOO_HEALTH_QUEUE } from '../odoo/odoo.constants';
import { OdooHealthProcessor } from './odoo-health.processor';
import { OdooHealthScheduler } from './odoo-health.scheduler';

@Module({
  imports: [
    BullModule.registerQueue({
      name: ODOO_HEALTH_QUEUE,
    }),
    OdooModule,
    LogsModule,
  ],
  providers: [OdooHealthProcessor, OdooHealthScheduler],
  exports: [BullModule],
})
export class QueuesModule {}
