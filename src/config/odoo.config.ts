import { registerAs } from '@nestjs/config';
import { ConfigurationError, Env, readInt, readOptionalString, readString } from './env.util';

export const ODOO_PROTOCOLS = ['jsonrpc', 'jsonrpc+ssl'] as const;
export type OdooProtocol = (typeof ODOO_PROTOCOLS)[number];

export interface OdooPoolSettings {
  minConnections: number;
  maxConnections: number;
  /** Seconds a handle may sit idle before it is discarded; 0 disables. */
  maxIdleTime: number;
  /** Seconds a handle may live in total; 0 disables. */
  maxLifetime: number;
  healthCheckInterval: number;
  /** Seconds a caller waits for a free handle. */
  connectionTimeout: number;
}

export interface OdooSettings {
  protocol: OdooProtocol;
  host: string;
  port: number;
  database: string;
  username: string;
  apiKey: string;
  version?: string;
  /** Seconds per RPC request. */
  requestTimeout: number;
  pool: OdooPoolSettings;
}

function isOdooProtocol(value: string): value is OdooProtocol {
  return ODOO_PROTOCOLS.some((protocol) => protocol === value);
}

export function loadOdooSettings(env: Env = process.env): OdooSettings {
  const protocol = readString(env, 'ODOO_PROTOCOL', 'jsonrpc');
  if (!isOdooProtocol(protocol)) {
    throw new ConfigurationError(
      `ODOO_PROTOCOL must be one of ${ODOO_PROTOCOLS.join(', ')}, got "${protocol}"`,
    );
  }

  return {
    protocol,
    host: readString(env, 'ODOO_HOST', 'localhost'),
    port: readInt(env, 'ODOO_PORT', 8069),
    database: readString(env, 'ODOO_DATABASE', 'odoo'),
    username: readString(env, 'ODOO_USERNAME', 'admin'),
    apiKey: env.ODOO_API_KEY ?? '',
    version: readOptionalString(env, 'ODOO_VERSION'),
    requestTimeout: readInt(env, 'ODOO_REQUEST_TIMEOUT', 120),
    pool: {
      minConnections: readInt(env, 'ODOO_POOL_MIN_CONNECTIONS', 1),
      maxConnections: readInt(env, 'ODOO_POOL_MAX_CONNECTIONS', 5),
      maxIdleTime: readInt(env, 'ODOO_POOL_MAX_IDLE_TIME', 300),
      maxLifetime: readInt(env, 'ODOO_POOL_MAX_LIFETIME', 3600),
      healthCheckInterval: readInt(env, 'ODOO_POOL_HEALTH_CHECK_INTERVAL', 60),
      connectionTimeout: readInt(env, 'ODOO_POOL_CONNECTION_TIMEOUT', 30),
    },
  };
}

export function odooBaseUrl(settings: Pick<OdooSettings, 'protocol' | 'host' | 'port'>): string {
  const scheme = settings.protocol === 'jsonrpc+ssl' ? 'https' : 'http';
  return `${scheme}://${settings.host}:${settings.port}`;
}

export default registerAs('odoo', () => loadOdooSettings());
