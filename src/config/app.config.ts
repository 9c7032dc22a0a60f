import { registerAs } from '@nestjs/config';
import { Env, readInt, readString } from './env.util';

export interface AppSettings {
  port: number;
  corsOrigin: string;
  mongodbUri: string;
  redis: { host: string; port: number };
  timezone: string;
  cacheTtlSeconds: number;
}

export function loadAppSettings(env: Env = process.env): AppSettings {
  return {
    port: readInt(env, 'PORT', 3000),
    corsOrigin: readString(env, 'CORS_ORIGIN', '*'),
    mongodbUri: readString(env, 'MONGODB_URI', 'mongodb://localhost:27017/sales-dashboard'),
    redis: {
      host: readString(env, 'REDIS_HOST', 'localhost'),
      port: readInt(env, 'REDIS_PORT', 6379),
    },
    timezone: readString(env, 'DASHBOARD_TIMEZONE', 'Asia/Jakarta'),
    cacheTtlSeconds: readInt(env, 'DASHBOARD_CACHE_TTL_SECONDS', 300),
  };
}

export default registerAs('app', () => loadAppSettings());
