import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Cache } from 'cache-manager';
import { isMatch } from 'date-fns';
import { AppSettings } from '../config/app.config';
import { OdooIntegrationError } from '../odoo/odoo.errors';
import { PosOrderRecord, SalesMetrics } from '../sales/interfaces/sales.interface';
import { SalesService } from '../sales/sales.service';
import { safeCall } from '../sales/utils/safe-call.util';
import { DashboardFilterStore } from './dashboard-filter.store';
import { DashboardView, KpiCard, OrderRow, PosFilterState, PosWindow } from './interfaces/dashboard.interface';
import {
  buildKpiCards,
  DATE_FORMAT,
  placeholderKpiCards,
  resolveWindow,
  TIME_FORMAT,
} from './utils/dashboard-format.util';

export const DASHBOARD_CACHE_PREFIX = 'dashboard:';
export const EMPTY_ORDERS_MESSAGE = 'No data to display yet.';

@Injectable()
export class DashboardService {
  private readonly logger = new Logger(DashboardService.name);
  private readonly cacheTtlMs: number;

  constructor(
    private readonly salesService: SalesService,
    private readonly filterStore: DashboardFilterStore,
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    configService: ConfigService,
  ) {
    this.cacheTtlMs = configService.getOrThrow<AppSettings>('app').cacheTtlSeconds * 1000;
  }

  getFilter(sessionId: string): PosFilterState {
    return this.filterStore.get(sessionId);
  }

  setFilter(sessionId: string, filter: PosFilterState): PosWindow {
    for (const date of [filter.startDate, filter.endDate]) {
      if (!isMatch(date, DATE_FORMAT)) {
        throw new BadRequestException(`Invalid date: ${date}`);
      }
    }
    for (const time of [filter.startTime, filter.endTime]) {
      if (!isMatch(time, TIME_FORMAT)) {
        throw new BadRequestException(`Invalid time: ${time}`);
      }
    }

    this.filterStore.set(sessionId, filter);
    return resolveWindow(filter, this.filterStore.timeZone);
  }

  async buildView(sessionId: string): Promise<DashboardView> {
    const window = resolveWindow(this.filterStore.get(sessionId), this.filterStore.timeZone);
    const errors: string[] = [];

    const connected = await safeCall(() => this.salesService.checkOdooHealth(), false);

    let kpis: KpiCard[];
    try {
      kpis = buildKpiCards(await this.getMetrics(window));
    } catch (error) {
      if (!(error instanceof OdooIntegrationError)) {
        throw error;
      }
      errors.push(`Failed to sync with database: ${error.message}`);
      kpis = placeholderKpiCards();
    }

    let orders: OrderRow[] = [];
    if (window.start > window.end) {
      errors.push('Invalid POS range: start is after end.');
    } else {
      try {
        orders = (await this.getOrders(window)).map(toOrderRow);
      } catch (error) {
        if (!(error instanceof OdooIntegrationError)) {
          throw error;
        }
        errors.push(`Unable to fetch recent sales data: ${error.message}`);
      }
    }

    return {
      status: { connected, label: connected ? 'Connected' : 'Not connected' },
      kpis,
      window: {
        filter: window.filter,
        startUtc: window.start.toISOString(),
        endUtc: window.end.toISOString(),
        caption: window.caption,
      },
      orders,
      errors,
      emptyMessage: orders.length === 0 ? EMPTY_ORDERS_MESSAGE : null,
    };
  }

  /** Drops every memoised metrics and order list entry. */
  async refresh(): Promise<number> {
    const keys = await this.cacheManager.store.keys();
    const dashboardKeys = keys.filter((key) => key.startsWith(DASHBOARD_CACHE_PREFIX));
    await Promise.all(dashboardKeys.map((key) => this.cacheManager.del(key)));

    this.logger.log(`Cleared ${dashboardKeys.length} cached dashboard entries`);
    return dashboardKeys.length;
  }

  private getMetrics(window: PosWindow): Promise<SalesMetrics> {
    return this.memo(cacheKey('metrics', window), () =>
      this.salesService.getSalesMetrics({ posStart: window.start, posEnd: window.end }),
    );
  }

  private getOrders(window: PosWindow): Promise<PosOrderRecord[]> {
    return this.memo(cacheKey('orders', window), () =>
      this.salesService.getRecentPosOrders({ limit: null, start: window.start, end: window.end }),
    );
  }

  private async memo<T>(key: string, load: () => Promise<T>): Promise<T> {
    const cached = await this.cacheManager.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await load();
    await this.cacheManager.set(key, value, this.cacheTtlMs);
    return value;
  }
}

function cacheKey(kind: string, window: PosWindow): string {
  return `${DASHBOARD_CACHE_PREFIX}${kind}:${window.start.toISOString()}:${window.end.toISOString()}`;
}

function toOrderRow(order: PosOrderRecord): OrderRow {
  return {
    orderNumber: order.name,
    customer: order.partner_id ? order.partner_id[1] : 'Unknown',
    amount: order.amount_total || 0,
    status: order.state,
    date: order.date_order,
  };
}
