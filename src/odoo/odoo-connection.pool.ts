import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { OdooSettings } from '../config/odoo.config';
import { CreateLogDto, LogsService } from '../logs/logs.service';
import { errorMessage } from '../common/utils/error.util';
import { ODOO_CONNECTION_FACTORY, ODOO_SETTINGS } from './odoo.constants';
import { OdooIntegrationError, OdooRpcError } from './odoo.errors';
import {
  Domain,
  OdooConnection,
  OdooConnectionFactory,
  PoolHealth,
  PooledConnection,
  PoolStats,
  ReadGroupOptions,
  ReadGroupRow,
  SearchReadOptions,
} from './interfaces/odoo.interface';

interface Waiter {
  /** `null` means a slot was freed and the waiter may open a new handle. */
  resolve: (connection: PooledConnection | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded pool of authenticated Odoo handles.
 *
 * Handles are checked out by one caller at a time. Idle handles past
 * `maxIdleTime` or `maxLifetime` are closed on their way out of the pool,
 * and `total` (idle + checked out + being opened) never exceeds
 * `maxConnections`.
 */
@Injectable()
export class OdooConnectionPool implements OnModuleDestroy {
  private readonly logger = new Logger(OdooConnectionPool.name);
  private readonly idle: PooledConnection[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly checkedOut = new Set<number>();
  private total = 0;
  private nextId = 1;
  private warmed = false;
  private warming: Promise<void> | null = null;
  private closed = false;

  constructor(
    @Inject(ODOO_SETTINGS) private readonly settings: OdooSettings,
    @Inject(ODOO_CONNECTION_FACTORY) private readonly connectionFactory: OdooConnectionFactory,
    @Optional() private readonly logsService?: LogsService,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  stats(): PoolStats {
    return {
      total: this.total,
      idle: this.idle.length,
      inUse: this.total - this.idle.length,
      waiting: this.waiters.length,
      min: this.settings.pool.minConnections,
      max: this.settings.pool.maxConnections,
    };
  }

  async warm(): Promise<void> {
    if (this.warmed) {
      return;
    }
    if (!this.warming) {
      this.warming = this.fillToMinimum().finally(() => {
        this.warming = null;
      });
    }
    await this.warming;
    this.warmed = true;
  }

  async acquire(): Promise<PooledConnection> {
    const connection = await this.acquireFree();
    this.checkedOut.add(connection.id);
    return connection;
  }

  release(connection: PooledConnection): void {
    if (!this.checkedOut.delete(connection.id)) {
      this.logger.warn(`Ignoring release of Odoo connection #${connection.id}, which is not checked out`);
      return;
    }
    connection.lastUsed = Date.now();
    this.checkIn(connection);
  }

  private async acquireFree(): Promise<PooledConnection> {
    this.assertOpen();
    await this.warm();

    const deadline = Date.now() + this.settings.pool.connectionTimeout * 1000;

    for (;;) {
      this.assertOpen();

      const idle = await this.takeIdle();
      if (idle) {
        return idle;
      }

      if (this.total < this.settings.pool.maxConnections) {
        return this.openReserved();
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new OdooIntegrationError('Timed out waiting for an available Odoo connection.');
      }

      const handed = await this.waitForConnection(remaining);
      if (handed === null) {
        continue;
      }
      if (this.shouldDiscard(handed)) {
        await this.discard(handed);
        continue;
      }
      return handed;
    }
  }

  private checkIn(connection: PooledConnection): void {
    if (this.closed) {
      void this.discard(connection);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(connection);
      return;
    }

    this.idle.push(connection);
  }

  /** Closes a handle that must not go back into the pool. */
  async discard(connection: PooledConnection): Promise<void> {
    this.checkedOut.delete(connection.id);
    this.total = Math.max(0, this.total - 1);
    this.notifyFreedSlot();

    try {
      await connection.client.close();
    } catch (error) {
      this.logger.warn(`Failed to close Odoo connection #${connection.id}: ${errorMessage(error)}`);
    }
  }

  async withConnection<T>(callback: (client: OdooConnection) => Promise<T>): Promise<T> {
    const connection = await this.acquire();

    let result: T;
    try {
      result = await callback(connection.client);
    } catch (error) {
      await this.discard(connection);
      if (error instanceof OdooRpcError) {
        throw new OdooIntegrationError(`Odoo RPC error: ${error.message}`, { cause: error });
      }
      throw error;
    }

    this.release(connection);
    return result;
  }

  searchRead<T>(model: string, options: SearchReadOptions = {}): Promise<T[]> {
    return this.audited('search_read', { model, ...options }, () =>
      this.withConnection((client) =>
        client.searchRead<T>(model, {
          ...options,
          domain: options.domain ?? [],
          fields: options.fields ?? [],
          offset: options.offset ?? 0,
        }),
      ),
    );
  }

  searchCount(model: string, domain: Domain = []): Promise<number> {
    return this.audited('search_count', { model, domain }, () =>
      this.withConnection((client) => client.searchCount(model, domain)),
    );
  }

  readGroup(
    model: string,
    domain: Domain,
    fields: string[],
    groupby: string[],
    options: ReadGroupOptions = {},
  ): Promise<ReadGroupRow[]> {
    return this.audited('read_group', { model, domain, fields, groupby }, () =>
      this.withConnection((client) => client.readGroup(model, domain, fields, groupby, options)),
    );
  }

  /**
   * `db.list` first; servers that block database listing still answer
   * `common.version`.
   */
  async ping(): Promise<boolean> {
    try {
      await this.withConnection(async (client) => {
        try {
          await client.listDatabases();
        } catch (error) {
          if (error instanceof OdooRpcError && error.isAccessDenied()) {
            await client.version();
            return;
          }
          throw error;
        }
      });
      return true;
    } catch (error) {
      if (error instanceof OdooIntegrationError) {
        this.logger.warn(`Odoo ping failed: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async healthCheck(): Promise<PoolHealth> {
    await this.evictExpired();

    if (!this.closed) {
      try {
        await this.fillToMinimum();
      } catch (error) {
        this.logger.warn(`Could not top up the Odoo pool: ${errorMessage(error)}`);
      }
    }

    const healthy = await this.ping();
    return { healthy, stats: this.stats() };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new OdooIntegrationError('Odoo connection pool is closed.'));
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map((connection) => this.discard(connection)));
    this.logger.log('Odoo connection pool closed');
  }

  private async fillToMinimum(): Promise<void> {
    const target = Math.min(this.settings.pool.minConnections, this.settings.pool.maxConnections);
    while (this.total < target) {
      const connection = await this.openReserved();
      this.checkIn(connection);
    }
  }

  /** Reserves a slot before the network round-trip so concurrent callers cannot overshoot `max`. */
  private async openReserved(): Promise<PooledConnection> {
    this.total += 1;
    try {
      return await this.createConnection();
    } catch (error) {
      this.total -= 1;
      this.notifyFreedSlot();
      throw error;
    }
  }

  private async createConnection(): Promise<PooledConnection> {
    if (!this.settings.apiKey) {
      throw new OdooIntegrationError('Missing Odoo API key. Set ODOO_API_KEY in the environment.');
    }

    const client = this.connectionFactory();
    try {
      await client.connect();
    } catch (error) {
      if (error instanceof OdooIntegrationError) {
        throw error;
      }
      throw new OdooIntegrationError('Failed to establish connection to Odoo.', { cause: error });
    }

    const now = Date.now();
    const connection: PooledConnection = { id: this.nextId++, client, createdAt: now, lastUsed: now };
    this.logger.log(`Opened Odoo connection #${connection.id} (${this.total}/${this.settings.pool.maxConnections})`);
    return connection;
  }

  private async takeIdle(): Promise<PooledConnection | null> {
    for (;;) {
      const connection = this.idle.shift();
      if (!connection) {
        return null;
      }
      if (!this.shouldDiscard(connection)) {
        return connection;
      }
      this.logger.debug(`Discarding stale Odoo connection #${connection.id}`);
      await this.discard(connection);
    }
  }

  private async evictExpired(): Promise<void> {
    const expired = this.idle.filter((connection) => this.shouldDiscard(connection));
    if (expired.length === 0) {
      return;
    }

    for (const connection of expired) {
      this.idle.splice(this.idle.indexOf(connection), 1);
    }
    await Promise.all(expired.map((connection) => this.discard(connection)));
    this.logger.log(`Evicted ${expired.length} stale Odoo connection(s)`);
  }

  private shouldDiscard(connection: PooledConnection): boolean {
    const now = Date.now();
    const maxIdleMs = this.settings.pool.maxIdleTime * 1000;
    const maxLifetimeMs = this.settings.pool.maxLifetime * 1000;

    if (maxIdleMs && now - connection.lastUsed > maxIdleMs) {
      return true;
    }
    if (maxLifetimeMs && now - connection.createdAt > maxLifetimeMs) {
      return true;
    }
    return false;
  }

  private waitForConnection(timeoutMs: number): Promise<PooledConnection | null> {
    return new Promise<PooledConnection | null>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new OdooIntegrationError('Timed out waiting for an available Odoo connection.'));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private notifyFreedSlot(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new OdooIntegrationError('Odoo connection pool is closed.');
    }
  }

  private async audited<T>(action: string, request: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    const logData = {
      service: 'odoo',
      action,
      request,
    };

    try {
      const result = await run();
      await this.recordLog({
        ...logData,
        status: 'success',
        response: Array.isArray(result) ? { rows: result.length } : { result },
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      await this.recordLog({
        ...logData,
        status: 'error',
        errorMessage: errorMessage(error),
        duration: Date.now() - startTime,
      });
      this.logger.error(`Error calling Odoo ${action} on ${String(request.model)}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async recordLog(entry: CreateLogDto): Promise<void> {
    if (!this.logsService) {
      return;
    }
    try {
      await this.logsService.create(entry);
    } catch (error) {
      this.logger.error(`Failed to log Odoo call: ${errorMessage(error)}`);
    }
  }
}
