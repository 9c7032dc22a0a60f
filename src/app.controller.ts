import { Controller, Get } from '@nestjs/common';
import { Public } from './auth/decorators/public.decorator';

export const APP_NAME = 'Sales Dashboard';
export const APP_VERSION = '0.3.1';

@Controller()
export class AppController {
  @Public()
  @Get('status')
  getStatus() {
    return {
      status: 'running',
      service: APP_NAME,
      version: APP_VERSION,
      endpoints: {
        auth: '/auth/login',
        dashboard: '/dashboard',
        sales: {
          recentOrders: '/sales/orders/recent',
          posOrders: '/sales/pos-orders',
          metrics: '/sales/metrics',
        },
        stockControl: '/stock-control/reconcile',
        odoo: {
          health: '/odoo/health',
          pool: '/odoo/pool',
        },
        logs: '/logs',
      },
    };
  }

  @Public()
  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
  }
}
