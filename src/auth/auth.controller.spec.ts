import { Controller, Get, INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import cookieParser from 'cookie-parser';
import request from 'supertest';
import { AuthModule } from './auth.module';
import { Public } from './decorators/public.decorator';

@Controller('sample')
class SampleController {
  @Public()
  @Get('open')
  open() {
    return { open: true };
  }

  @Get('closed')
  closed() {
    return { closed: true };
  }
}

describe('AuthController', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [
            () => ({
              auth: {
                password: 'test-password',
                jwtSecret: 'test-secret',
                sessionTtlSeconds: 600,
                cookieName: 'dashboard_session',
                cookieSecure: false,
              },
            }),
          ],
        }),
        AuthModule,
      ],
      controllers: [SampleController],
    }).compile();

    app = moduleRef.createNestApplication();
    app.use(cookieParser());
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should let public routes through without a session', async () => {
    await request(app.getHttpServer()).get('/sample/open').expect(200, { open: true });
  });

  it('should reject protected routes without a session', async () => {
    const response = await request(app.getHttpServer()).get('/sample/closed').expect(401);

    expect(response.body.message).toBe('Missing session token');
  });

  it('should reject a wrong password', async () => {
    const response = await request(app.getHttpServer()).post('/auth/login').send({ password: 'wrong' }).expect(401);

    expect(response.body.message).toBe('Invalid password');
  });

  it('should reject a login without a password', async () => {
    await request(app.getHttpServer()).post('/auth/login').send({}).expect(400);
  });

  it('should sign in with a bearer token and sign out again', async () => {
    const login = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ password: 'test-password' })
      .expect(200);

    expect(login.body.expiresIn).toBe(600);
    const authorization = `Bearer ${login.body.accessToken}`;

    const session = await request(app.getHttpServer()).get('/auth/session').set('Authorization', authorization).expect(200);
    expect(session.body.authenticated).toBe(true);

    await request(app.getHttpServer()).post('/auth/logout').set('Authorization', authorization).expect(200, { ok: true });

    const after = await request(app.getHttpServer()).get('/sample/closed').set('Authorization', authorization).expect(401);
    expect(after.body.message).toBe('Invalid or expired session');
  });

  it('should set an http-only session cookie that the guard accepts', async () => {
    const login = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ password: 'test-password' })
      .expect(200);

    const header: unknown = login.headers['set-cookie'];
    const setCookie = Array.isArray(header) ? header.filter((value): value is string => typeof value === 'string') : [];
    const sessionCookie = setCookie.find((cookie) => cookie.startsWith('dashboard_session='));
    expect(sessionCookie).toContain('HttpOnly');

    const cookie = sessionCookie?.split(';')[0] ?? '';
    await request(app.getHttpServer()).get('/sample/closed').set('Cookie', cookie).expect(200, { closed: true });
  });
});
