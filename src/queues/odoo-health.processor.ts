import { Process, Processor } from '@nestjs/bull';
import { Logger } from '@nestjs/common';
import { Job } from 'bull';
import { errorMessage } from '../common/utils/error.util';
import { LogsService } from '../logs/logs.service';
import { OdooConnectionPool } from '../odoo/odoo-connection.pool';
import { ODOO_HEALTH_JOB, ODOO_HEALTH_QUEUE } from '../odoo/odoo.constants';
import { PoolHealth } from '../odoo/interfaces/odoo.interface';

@Processor(ODOO_HEALTH_QUEUE)
export class OdooHealthProcessor {
  private readonly logger = new Logger(OdooHealthProcessor.name);

  constructor(
    private readonly pool: OdooConnectionPool,
    private readonly logsService: LogsService,
  ) {}

  @Process(ODOO_HEALTH_JOB)
  async handleHealthCheck(job: Pick<Job, 'id'>): Promise<PoolHealth> {
    const startTime = Date.now();

    try {
      const health = await this.pool.healthCheck();
      const duration = Date.now() - startTime;

      await this.logsService.create({
        service: 'odoo',
        action: 'pool_health_check',
        status: health.healthy ? 'success' : 'error',
        response: health,
        metadata: { jobId: job.id },
        errorMessage: health.healthy ? undefined : 'Odoo did not answer the health ping',
        duration,
      });

      if (health.healthy) {
        this.logger.debug(`Odoo pool healthy (${health.stats.idle} idle / ${health.stats.total} open)`);
      } else {
        this.logger.warn('Odoo pool health check failed');
      }
      return health;
    } catch (error) {
      await this.logsService.create({
        service: 'odoo',
        action: 'pool_health_check',
        status: 'error',
        metadata: { jobId: job.id },
        errorMessage: errorMessage(error),
        duration: Date.now() - startTime,
      });

      this.logger.error(`Odoo pool health check crashed: ${errorMessage(error)}`);
      throw error;
    }
  }
}
