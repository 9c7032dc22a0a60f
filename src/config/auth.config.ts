import { registerAs } from '@nestjs/config';
import { Env, readBoolean, readInt, readOptionalString, readString } from './env.util';

export interface AuthSettings {
  /** Unset means every login attempt is rejected. */
  password?: string;
  jwtSecret: string;
  sessionTtlSeconds: number;
  cookieName: string;
  cookieSecure: boolean;
}

export const DEFAULT_JWT_SECRET = 'change-me';

export function loadAuthSettings(env: Env = process.env): AuthSettings {
  return {
    password: readOptionalString(env, 'DASHBOARD_PASSWORD'),
    jwtSecret: readString(env, 'JWT_SECRET', DEFAULT_JWT_SECRET),
    sessionTtlSeconds: readInt(env, 'SESSION_TTL_SECONDS', 43200),
    cookieName: readString(env, 'SESSION_COOKIE_NAME', 'dashboard_session'),
    cookieSecure: readBoolean(env, 'COOKIE_SECURE', false),
  };
}

export default registerAs('auth', () => loadAuthSettings());
