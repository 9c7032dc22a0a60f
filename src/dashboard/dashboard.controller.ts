import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put } from '@nestjs/common';
import { SessionId } from '../auth/decorators/session-id.decorator';
import { DashboardService } from './dashboard.service';
import { DashboardFilterDto } from './dto/dashboard-filter.dto';

@Controller('dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  getView(@SessionId() sessionId: string) {
    return this.dashboardService.buildView(sessionId);
  }

  @Get('filter')
  getFilter(@SessionId() sessionId: string) {
    return this.dashboardService.getFilter(sessionId);
  }

  @Put('filter')
  setFilter(@SessionId() sessionId: string, @Body() dto: DashboardFilterDto) {
    const window = this.dashboardService.setFilter(sessionId, dto);
    return {
      filter: window.filter,
      startUtc: window.start.toISOString(),
      endUtc: window.end.toISOString(),
      caption: window.caption,
    };
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh() {
    await this.dashboardService.refresh();
    return { refreshed: true, message: 'Dashboard data refreshed' };
  }
}
