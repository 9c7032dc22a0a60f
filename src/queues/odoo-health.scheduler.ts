import { InjectQueue } from '@nestjs/bull';
import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Queue } from 'bull';
import { OdooSettings } from '../config/odoo.config';
import { ODOO_HEALTH_JOB, ODOO_HEALTH_QUEUE, ODOO_SETTINGS } from '../odoo/odoo.constants';

/** Registers the repeatable pool health check, replacing any left from an earlier run. */
@Injectable()
export class OdooHealthScheduler implements OnApplicationBootstrap {
  private readonly logger = new Logger(OdooHealthScheduler.name);

  constructor(
    @InjectQueue(ODOO_HEALTH_QUEUE) private readonly healthQueue: Queue,
    @Inject(ODOO_SETTINGS) private readonly settings: OdooSettings,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const existing = await this.healthQueue.getRepeatableJobs();
    await Promise.all(existing.map((job) => this.healthQueue.removeRepeatableByKey(job.key)));

    const intervalSeconds = this.settings.pool.healthCheckInterval;
    if (intervalSeconds <= 0) {
      this.logger.log('Odoo health checks disabled');
      return;
    }

    await this.healthQueue.add(
      ODOO_HEALTH_JOB,
      {},
      {
        repeat: { every: intervalSeconds * 1000 },
        removeOnComplete: true,
        removeOnFail: 50,
      },
    );
    this.logger.log(`Scheduled Odoo health check every ${intervalSeconds}s`);
  }
}
