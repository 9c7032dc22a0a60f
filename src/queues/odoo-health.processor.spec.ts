import { Test } from '@nestjs/testing';
import { Job } from 'bull';
import { LogsService } from '../logs/logs.service';
import { OdooConnectionPool } from '../odoo/odoo-connection.pool';
import { PoolHealth } from '../odoo/interfaces/odoo.interface';
import { OdooHealthProcessor } from './odoo-health.processor';

const stats = { total: 2, idle: 2, inUse: 0, waiting: 0, min: 1, max: 5 };

describe('OdooHealthProcessor', () => {
  let processor: OdooHealthProcessor;
  let pool: { healthCheck: jest.Mock };
  let logsService: { create: jest.Mock };
  const job: Pick<Job, 'id'> = { id: 42 };

  beforeEach(async () => {
    pool = { healthCheck: jest.fn() };
    logsService = { create: jest.fn().mockResolvedValue({}) };

    const module = await Test.createTestingModule({
      providers: [
        OdooHealthProcessor,
        { provide: OdooConnectionPool, useValue: pool },
        { provide: LogsService, useValue: logsService },
      ],
    }).compile();

    processor = module.get(OdooHealthProcessor);
  });

  it('should record a healthy pool', async () => {
    const health: PoolHealth = { healthy: true, stats };
    pool.healthCheck.mockResolvedValue(health);

    await expect(processor.handleHealthCheck(job)).resolves.toBe(health);

    expect(logsService.create).toHaveBeenCalledWith(
      expect.objectContaining({
        service: 'odoo',
        action: 'pool_health_check',
        status: 'success',
        response: health,
        metadata: { jobId: 42 },
        errorMessage: undefined,
      }),
    );
  });

  it('should record an unhealthy pool as an error', async () => {
    pool.healthCheck.mockResolvedValue({ healthy: false, stats });

    await processor.handleHealthCheck(job);

    expect(logsService.create).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'error', errorMessage: 'Odoo did not answer the health ping' }),
    );
  });

  it('should log and rethrow when the check itself fails', async () => {
    pool.healthCheck.mockRejectedValue(new Error('pool closed'));

    await expect(processor.handleHealthCheck(job)).rejects.toThrow('pool closed');

    expect(logsService.create).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'error', errorMessage: 'pool closed' }),
    );
  });
});
