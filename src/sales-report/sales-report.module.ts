import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { AuthService } from '../auth/auth.service';
import { SessionStore } from '../auth/session-store';
import { TemplatesModule } from '../common/templates/templates.module';
import { SalesReport } from './interfaces/sales-report.interface';
import { SALES_REPORTS } from './sales-report.constants';
import { SalesReportController } from './sales-report.controller';
import { SalesReportPageController } from './sales-report-page.controller';
import { SalesReportService } from './sales-report.service';

@Module({
  imports: [AuthModule, TemplatesModule],
  controllers: [SalesReportController, SalesReportPageController],
  providers: [
    SalesReportService,
    {
      provide: SALES_REPORTS,
      inject: [AuthService],
      useFactory: (authService: AuthService) => new SessionStore<SalesReport>(authService),
    },
  ],
})
export class SalesReportModule {}
