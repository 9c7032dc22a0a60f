import { Controller, Get, Logger } from '@nestjs/common';
import { OdooConnectionPool } from './odoo-connection.pool';

@Controller('odoo')
export class OdooController {
  private readonly logger = new Logger(OdooController.name);

  constructor(private readonly pool: OdooConnectionPool) {}

  @Get('health')
  async getHealth() {
    const connected = await this.pool.ping();
    this.logger.log(`Odoo health requested: ${connected ? 'connected' : 'not connected'}`);

    return {
      connected,
      pool: this.pool.stats(),
    };
  }

  @Get('pool')
  getPool() {
    return this.pool.stats();
  }
}
