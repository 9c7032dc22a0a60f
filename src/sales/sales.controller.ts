import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { SalesService } from './sales.service';
import { PosOrdersQueryDto, PosWindowQueryDto, RecentOrdersQueryDto } from './dto/sales-query.dto';

@Controller('sales')
export class SalesController {
  constructor(private readonly salesService: SalesService) {}

  @Get('orders/recent')
  async getRecentOrders(@Query() query: RecentOrdersQueryDto) {
    return this.salesService.getRecentSalesOrders(query.limit);
  }

  @Get('pos-orders')
  async getPosOrders(@Query() query: PosOrdersQueryDto) {
    assertWindow(query);
    return this.salesService.getRecentPosOrders({ start: query.start, end: query.end, limit: query.limit });
  }

  @Get('metrics')
  async getMetrics(@Query() query: PosWindowQueryDto) {
    assertWindow(query);
    return this.salesService.getSalesMetrics({ posStart: query.start, posEnd: query.end });
  }
}

function assertWindow({ start, end }: PosWindowQueryDto): void {
  if (start && end && start > end) {
    throw new BadRequestException('start must not be after end');
  }
}
