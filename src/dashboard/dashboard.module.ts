import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { TemplatesModule } from '../common/templates/templates.module';
import { SalesModule } from '../sales/sales.module';
import { DashboardController } from './dashboard.controller';
import { DashboardFilterStore } from './dashboard-filter.store';
import { DashboardService } from './dashboard.service';
import { PagesController } from './pages.controller';

@Module({
  imports: [AuthModule, SalesModule, TemplatesModule],
  controllers: [DashboardController, PagesController],
  providers: [DashboardFilterStore, DashboardService],
})
export class DashboardModule {}
