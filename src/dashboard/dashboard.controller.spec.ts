import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import cookieParser from 'cookie-parser';
import request from 'supertest';
import { AuthModule } from '../auth/auth.module';
import { authTestingConfig, signIn } from '../auth/testing/session.testing';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { PosWindow } from './interfaces/dashboard.interface';

const filter = { startDate: '2024-05-01', startTime: '08:00', endDate: '2024-05-02', endTime: '09:15' };

const window: PosWindow = {
  filter,
  start: new Date('2024-05-01T01:00:00.000Z'),
  end: new Date('2024-05-02T02:15:00.000Z'),
  caption: 'Showing POS orders from 2024-05-01 08:00 to 2024-05-02 09:15.',
};

describe('DashboardController', () => {
  let app: INestApplication;
  let cookie: string;
  let dashboard: { getFilter: jest.Mock; setFilter: jest.Mock; refresh: jest.Mock };

  beforeEach(async () => {
    dashboard = {
      getFilter: jest.fn().mockReturnValue(filter),
      setFilter: jest.fn().mockReturnValue(window),
      refresh: jest.fn().mockResolvedValue(2),
    };

    const moduleRef = await Test.createTestingModule({
      imports: [authTestingConfig(), AuthModule],
      controllers: [DashboardController],
      providers: [{ provide: DashboardService, useValue: dashboard }],
    }).compile();

    app = moduleRef.createNestApplication();
    app.use(cookieParser());
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }));
    await app.init();

    cookie = await signIn(app);
  });

  afterEach(async () => {
    await app.close();
  });

  it('should return the session filter', async () => {
    await request(app.getHttpServer()).get('/dashboard/filter').set('Cookie', cookie).expect(200, filter);

    expect(dashboard.getFilter).toHaveBeenCalledWith(expect.any(String));
  });

  it('should replace the filter and answer with the resolved window', async () => {
    const response = await request(app.getHttpServer()).put('/dashboard/filter').set('Cookie', cookie).send(filter).expect(200);

    expect(response.body).toEqual({
      filter,
      startUtc: '2024-05-01T01:00:00.000Z',
      endUtc: '2024-05-02T02:15:00.000Z',
      caption: 'Showing POS orders from 2024-05-01 08:00 to 2024-05-02 09:15.',
    });
    expect(dashboard.setFilter).toHaveBeenCalledWith(expect.any(String), filter);
  });

  it('should reject a malformed hour', async () => {
    const response = await request(app.getHttpServer())
      .put('/dashboard/filter')
      .set('Cookie', cookie)
      .send({ ...filter, endTime: '24:00' })
      .expect(400);

    expect(response.body.message).toEqual(['endTime must use HH:mm']);
    expect(dashboard.setFilter).not.toHaveBeenCalled();
  });

  it('should clear memoised data on refresh', async () => {
    await request(app.getHttpServer())
      .post('/dashboard/refresh')
      .set('Cookie', cookie)
      .expect(200, { refreshed: true, message: 'Dashboard data refreshed' });

    expect(dashboard.refresh).toHaveBeenCalledTimes(1);
  });

  it('should require a session', async () => {
    await request(app.getHttpServer()).post('/dashboard/refresh').expect(401);

    expect(dashboard.refresh).not.toHaveBeenCalled();
  });
});
