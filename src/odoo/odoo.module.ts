import { Module } from '@nestjs/common';
import { LogsModule } from '../logs/logs.module';
import { OdooController } from './odoo.controller';
import { OdooConnectionPool } from './odoo-connection.pool';
import { ODOO_SETTINGS } from './odoo.constants';
import { odooPoolProviders } from './odoo.providers';

@Module({
  imports: [LogsModule],
  controllers: [OdooController],
  providers: odooPoolProviders,
  exports: [OdooConnectionPool, ODOO_SETTINGS],
})
export class OdooModule {}
