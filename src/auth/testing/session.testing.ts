import { DynamicModule, INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import request from 'supertest';

export const TEST_PASSWORD = 'test-password';
export const TEST_COOKIE_NAME = 'dashboard_session';

export function authTestingConfig(): DynamicModule {
  return ConfigModule.forRoot({
    isGlobal: true,
    ignoreEnvFile: true,
    load: [
      () => ({
        auth: {
          password: TEST_PASSWORD,
          jwtSecret: 'test-secret',
          sessionTtlSeconds: 600,
          cookieName: TEST_COOKIE_NAME,
          cookieSecure: false,
        },
      }),
    ],
  });
}

/** Signs in through `POST /auth/login` and returns the `name=value` session cookie. */
export async function signIn(app: INestApplication): Promise<string> {
  const response = await request(app.getHttpServer()).post('/auth/login').send({ password: TEST_PASSWORD }).expect(200);

  const header: unknown = response.headers['set-cookie'];
  const cookies = Array.isArray(header) ? header.filter((value): value is string => typeof value === 'string') : [];
  const session = cookies.find((cookie) => cookie.startsWith(`${TEST_COOKIE_NAME}=`));
  if (!session) {
    throw new Error('Login did not set the session cookie');
  }
  return session.split(';')[0];
}
