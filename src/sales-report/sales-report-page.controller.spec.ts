import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import cookieParser from 'cookie-parser';
import request from 'supertest';
import { authTestingConfig, signIn } from '../auth/testing/session.testing';
import { SalesReportModule } from './sales-report.module';
import { salesWorkbook } from './testing/sales-workbook.testing';

describe('SalesReportPageController', () => {
  let app: INestApplication;
  let cookie: string;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [authTestingConfig(), SalesReportModule],
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

  async function upload(): Promise<request.Response> {
    return request(app.getHttpServer())
      .post('/ba-report')
      .set('Cookie', cookie)
      .attach('file', await salesWorkbook(), 'penjualan-ba.xlsx');
  }

  it('should send visitors without a session to the login page', async () => {
    await request(app.getHttpServer()).get('/ba-report').expect(303).expect('Location', '/login');
  });

  it('should show the upload form', async () => {
    const response = await request(app.getHttpServer()).get('/ba-report').set('Cookie', cookie).expect(200);

    expect(response.text).toContain('<form class="upload" method="post" action="/ba-report" enctype="multipart/form-data">');
    expect(response.text).not.toContain('<h2>Workbooks</h2>');
  });

  it('should show the last report of the session', async () => {
    expect((await upload()).status).toBe(303);

    const response = await request(app.getHttpServer()).get('/ba-report').set('Cookie', cookie).expect(200);

    expect(response.text).toContain('<div>Total Rows</div><div class="value">6</div>');
    expect(response.text).toContain('<div>Date Range</div><div class="value">2024-05-01 to 2024-05-02</div>');
    expect(response.text).toContain(
      '<a href="/sales-report/workbooks/Glow%20Group_01052024_to_02052024">Glow Group_01052024_to_02052024.xlsx</a>',
    );
    expect(response.text).toContain('<li>Paragon</li>');
  });

  it('should redirect back to the page after an upload', async () => {
    const response = await upload();

    expect(response.status).toBe(303);
    expect(response.headers.location).toBe('/ba-report');
  });

  it('should re-render the form with the error', async () => {
    const response = await request(app.getHttpServer())
      .post('/ba-report')
      .set('Cookie', cookie)
      .field('separateByDate', 'true')
      .attach('file', Buffer.from('Order Date,Brand\n', 'utf8'), 'penjualan.csv')
      .expect(400);

    expect(response.text).toContain('<p class="error">Upload the sales export as an .xlsx workbook</p>');
    expect(response.text).toContain('<option value="true" selected>One pivot per day</option>');
  });

  it('should clear the stored report', async () => {
    expect((await upload()).status).toBe(303);

    await request(app.getHttpServer())
      .post('/ba-report/clear')
      .set('Cookie', cookie)
      .expect(303)
      .expect('Location', '/ba-report');

    await request(app.getHttpServer()).get('/sales-report').set('Cookie', cookie).expect(404);
  });
});
