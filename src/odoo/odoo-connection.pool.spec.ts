import { Test } from '@nestjs/testing';
import { OdooPoolSettings, OdooSettings } from '../config/odoo.config';
import { LogsService } from '../logs/logs.service';
import { OdooConnectionPool } from './odoo-connection.pool';
import { ODOO_CONNECTION_FACTORY, ODOO_SETTINGS } from './odoo.constants';
import { OdooAuthenticationError, OdooIntegrationError, OdooRpcError } from './odoo.errors';
import { OdooConnection } from './interfaces/odoo.interface';

function createSettings(pool: Partial<OdooPoolSettings> = {}, overrides: Partial<OdooSettings> = {}): OdooSettings {
  return {
    protocol: 'jsonrpc',
    host: 'odoo.test',
    port: 8069,
    database: 'shop',
    username: 'reporting',
    apiKey: 'test-secret',
    requestTimeout: 5,
    pool: {
      minConnections: 1,
      maxConnections: 3,
      maxIdleTime: 300,
      maxLifetime: 3600,
      healthCheckInterval: 60,
      connectionTimeout: 1,
      ...pool,
    },
    ...overrides,
  };
}

function createClient(): jest.Mocked<OdooConnection> {
  return {
    connect: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
    listDatabases: jest.fn().mockResolvedValue(['shop']),
    version: jest.fn().mockResolvedValue({ server_version: '17.0' }),
    searchRead: jest.fn().mockResolvedValue([]),
    searchCount: jest.fn().mockResolvedValue(0),
    readGroup: jest.fn().mockResolvedValue([]),
  };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('OdooConnectionPool', () => {
  let clients: jest.Mocked<OdooConnection>[];
  let configure: (client: jest.Mocked<OdooConnection>) => void;
  let factory: jest.Mock<OdooConnection, []>;

  function createPool(settings: OdooSettings): OdooConnectionPool {
    return new OdooConnectionPool(settings, factory);
  }

  beforeEach(() => {
    clients = [];
    configure = () => undefined;
    factory = jest.fn(() => {
      const client = createClient();
      configure(client);
      clients.push(client);
      return client;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('acquire / release', () => {
    it('should warm the pool to its minimum on first use', async () => {
      const pool = createPool(createSettings({ minConnections: 2, maxConnections: 3 }));

      const connection = await pool.acquire();

      expect(factory).toHaveBeenCalledTimes(2);
      expect(connection.id).toBe(1);
      expect(pool.stats()).toEqual({ total: 2, idle: 1, inUse: 1, waiting: 0, min: 2, max: 3 });
    });

    it('should clamp the minimum to the maximum', async () => {
      const pool = createPool(createSettings({ minConnections: 4, maxConnections: 2 }));

      await pool.warm();

      expect(factory).toHaveBeenCalledTimes(2);
      expect(pool.stats().total).toBe(2);
    });

    it('should warm only once under concurrent first use', async () => {
      const pool = createPool(createSettings({ minConnections: 1, maxConnections: 3 }));

      const [first, second] = await Promise.all([pool.acquire(), pool.acquire()]);

      expect(first.id).not.toBe(second.id);
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should reuse a released connection', async () => {
      const pool = createPool(createSettings());

      const first = await pool.acquire();
      pool.release(first);
      const second = await pool.acquire();

      expect(second).toBe(first);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should time out when every connection is checked out', async () => {
      const pool = createPool(createSettings({ minConnections: 0, maxConnections: 2, connectionTimeout: 0.05 }));

      await pool.acquire();
      await pool.acquire();

      await expect(pool.acquire()).rejects.toThrow('Timed out waiting for an available Odoo connection.');
      expect(factory).toHaveBeenCalledTimes(2);
      expect(pool.stats()).toMatchObject({ total: 2, inUse: 2, waiting: 0 });
    });

    it('should hand a released connection to the oldest waiter', async () => {
      const pool = createPool(createSettings({ minConnections: 0, maxConnections: 1 }));

      const held = await pool.acquire();
      const pending = pool.acquire();
      await flush();

      expect(pool.stats().waiting).toBe(1);

      pool.release(held);

      await expect(pending).resolves.toBe(held);
      expect(pool.stats()).toMatchObject({ total: 1, idle: 0, inUse: 1, waiting: 0 });
    });

    it('should let a waiter open a new connection when one is discarded', async () => {
      const pool = createPool(createSettings({ minConnections: 0, maxConnections: 1 }));

      const held = await pool.acquire();
      const pending = pool.acquire();
      await flush();

      await pool.discard(held);
      const next = await pending;

      expect(next.id).toBe(2);
      expect(clients[0].close).toHaveBeenCalledTimes(1);
      expect(pool.stats().total).toBe(1);
    });

    it('should ignore a second release of the same connection', async () => {
      const pool = createPool(createSettings());

      const connection = await pool.acquire();
      pool.release(connection);
      pool.release(connection);

      expect(pool.stats()).toMatchObject({ total: 1, idle: 1 });
    });
  });

  describe('eviction', () => {
    let now: number;

    beforeEach(() => {
      now = 1_700_000_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => now);
    });

    it('should discard connections idle for longer than maxIdleTime', async () => {
      const pool = createPool(createSettings({ maxIdleTime: 300 }));

      pool.release(await pool.acquire());
      now += 301_000;
      const connection = await pool.acquire();

      expect(connection.id).toBe(2);
      expect(clients[0].close).toHaveBeenCalledTimes(1);
      expect(pool.stats().total).toBe(1);
    });

    it('should discard connections older than maxLifetime even when recently used', async () => {
      const pool = createPool(createSettings({ maxIdleTime: 0, maxLifetime: 3600 }));

      const first = await pool.acquire();
      now += 3_599_000;
      pool.release(first);
      now += 2_000;
      const connection = await pool.acquire();

      expect(connection.id).toBe(2);
      expect(clients[0].close).toHaveBeenCalledTimes(1);
    });

    it('should keep connections forever when both limits are disabled', async () => {
      const pool = createPool(createSettings({ maxIdleTime: 0, maxLifetime: 0 }));

      const first = await pool.acquire();
      pool.release(first);
      now += 10 * 24 * 3_600_000;

      await expect(pool.acquire()).resolves.toBe(first);
    });
  });

  describe('connection creation', () => {
    it('should require an API key', async () => {
      const pool = createPool(createSettings({}, { apiKey: '' }));

      await expect(pool.acquire()).rejects.toThrow('Missing Odoo API key. Set ODOO_API_KEY in the environment.');
      expect(factory).not.toHaveBeenCalled();
      expect(pool.stats().total).toBe(0);
    });

    it('should wrap unexpected connect failures and free the slot', async () => {
      configure = (client) => client.connect.mockRejectedValue(new Error('socket hang up'));
      const pool = createPool(createSettings({ minConnections: 0 }));

      const error = await pool.acquire().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(OdooIntegrationError);
      expect(error).toHaveProperty('message', 'Failed to establish connection to Odoo.');
      expect(pool.stats().total).toBe(0);
    });

    it('should keep Odoo authentication errors as they are', async () => {
      configure = (client) => client.connect.mockRejectedValue(new OdooAuthenticationError('bad key'));
      const pool = createPool(createSettings());

      await expect(pool.acquire()).rejects.toBeInstanceOf(OdooAuthenticationError);
    });
  });

  describe('withConnection', () => {
    it('should release the connection after a successful call', async () => {
      const pool = createPool(createSettings());

      const count = await pool.withConnection(async () => 42);

      expect(count).toBe(42);
      expect(pool.stats()).toMatchObject({ total: 1, idle: 1, inUse: 0 });
    });

    it('should discard the connection and wrap Odoo RPC errors', async () => {
      configure = (client) =>
        client.searchCount.mockRejectedValue(new OdooRpcError('Access Denied', 200, 'odoo.exceptions.AccessDenied'));
      const pool = createPool(createSettings());

      const error = await pool.searchCount('sale.order').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(OdooIntegrationError);
      expect(error).not.toBeInstanceOf(OdooRpcError);
      expect(error).toHaveProperty('message', 'Odoo RPC error: Access Denied');
      expect(clients[0].close).toHaveBeenCalledTimes(1);
      expect(pool.stats().total).toBe(0);
    });

    it('should discard the connection and rethrow other errors unchanged', async () => {
      const pool = createPool(createSettings());
      const failure = new TypeError('boom');

      await expect(
        pool.withConnection(async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);
      expect(pool.stats().total).toBe(0);
    });

    it('should default domain, fields and offset for search_read', async () => {
      const pool = createPool(createSettings());

      await pool.searchRead('sale.order', { limit: 5 });

      expect(clients[0].searchRead).toHaveBeenCalledWith('sale.order', {
        limit: 5,
        domain: [],
        fields: [],
        offset: 0,
      });
    });
  });

  describe('ping', () => {
    it('should report true when db.list answers', async () => {
      const pool = createPool(createSettings());

      await expect(pool.ping()).resolves.toBe(true);
      expect(clients[0].listDatabases).toHaveBeenCalledTimes(1);
    });

    it('should fall back to common.version when database listing is blocked', async () => {
      configure = (client) =>
        client.listDatabases.mockRejectedValue(new OdooRpcError('Access Denied', 200, 'odoo.exceptions.AccessDenied'));
      const pool = createPool(createSettings());

      await expect(pool.ping()).resolves.toBe(true);
      expect(clients[0].version).toHaveBeenCalledTimes(1);
      expect(pool.stats().idle).toBe(1);
    });

    it('should report false when Odoo cannot be reached', async () => {
      configure = (client) => client.connect.mockRejectedValue(new OdooIntegrationError('refused'));
      const pool = createPool(createSettings());

      await expect(pool.ping()).resolves.toBe(false);
    });
  });

  describe('healthCheck', () => {
    it('should top the pool up to its minimum and ping', async () => {
      const pool = createPool(createSettings({ minConnections: 2 }));

      const health = await pool.healthCheck();

      expect(health).toEqual({
        healthy: true,
        stats: { total: 2, idle: 2, inUse: 0, waiting: 0, min: 2, max: 3 },
      });
    });

    it('should evict stale idle connections', async () => {
      let now = 1_700_000_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => now);
      const pool = createPool(createSettings({ minConnections: 1, maxIdleTime: 60 }));

      await pool.warm();
      now += 61_000;
      await pool.healthCheck();

      expect(clients[0].close).toHaveBeenCalledTimes(1);
      expect(pool.stats()).toMatchObject({ total: 1, idle: 1 });
    });
  });

  describe('close', () => {
    it('should reject waiters and close idle connections', async () => {
      const pool = createPool(createSettings({ minConnections: 2, maxConnections: 2 }));

      const first = await pool.acquire();
      await pool.acquire();
      const pending = pool.acquire().catch((caught: unknown) => caught);
      await flush();

      await pool.close();

      expect(await pending).toHaveProperty('message', 'Odoo connection pool is closed.');
      expect(clients[0].close).not.toHaveBeenCalled();

      pool.release(first);
      await flush();
      expect(clients[0].close).toHaveBeenCalledTimes(1);
      await expect(pool.acquire()).rejects.toThrow('Odoo connection pool is closed.');
    });
  });

  describe('audit logging', () => {
    it('should record each call through the logs service', async () => {
      const logs = { create: jest.fn().mockResolvedValue({}) };
      const module = await Test.createTestingModule({
        providers: [
          OdooConnectionPool,
          { provide: ODOO_SETTINGS, useValue: createSettings() },
          { provide: ODOO_CONNECTION_FACTORY, useValue: factory },
          { provide: LogsService, useValue: logs },
        ],
      }).compile();
      const pool = module.get(OdooConnectionPool);

      await pool.searchCount('sale.order', [['state', '=', 'draft']]);

      expect(logs.create).toHaveBeenCalledWith(
        expect.objectContaining({
          service: 'odoo',
          action: 'search_count',
          status: 'success',
          request: { model: 'sale.order', domain: [['state', '=', 'draft']] },
          response: { result: 0 },
        }),
      );
    });

    it('should not fail the call when the log cannot be written', async () => {
      const logs = { create: jest.fn().mockRejectedValue(new Error('mongo down')) };
      const module = await Test.createTestingModule({
        providers: [
          OdooConnectionPool,
          { provide: ODOO_SETTINGS, useValue: createSettings() },
          { provide: ODOO_CONNECTION_FACTORY, useValue: factory },
          { provide: LogsService, useValue: logs },
        ],
      }).compile();
      const pool = module.get(OdooConnectionPool);

      await expect(pool.searchCount('sale.order')).resolves.toBe(0);
      expect(logs.create).toHaveBeenCalledTimes(1);
    });
  });
});
