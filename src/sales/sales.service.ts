import { Injectable, Logger } from '@nestjs/common';
import { OdooConnectionPool } from '../odoo/odoo-connection.pool';
import { POS_ORDER_MODEL, SALE_ORDER_MODEL } from '../odoo/odoo.constants';
import { Domain, ReadGroupRow } from '../odoo/interfaces/odoo.interface';
import {
  PosOrderQuery,
  PosOrderRecord,
  SaleOrderRecord,
  SalesMetrics,
  SalesMetricsQuery,
} from './interfaces/sales.interface';
import { resolvePosWindow, toOdooDatetime } from './utils/odoo-datetime.util';

export const ORDER_FIELDS = ['name', 'date_order', 'amount_total', 'state', 'partner_id'];
export const DEFAULT_ORDER_LIMIT = 10;

const CONFIRMED_DOMAIN: Domain = [['state', 'in', ['sale', 'done']]];
const DRAFT_DOMAIN: Domain = [['state', '=', 'draft']];
const CANCELLED_DOMAIN: Domain = [['state', '=', 'cancel']];

@Injectable()
export class SalesService {
  private readonly logger = new Logger(SalesService.name);

  constructor(private readonly pool: OdooConnectionPool) {}

  /** Recent non-cancelled sale orders, newest first. */
  async getRecentSalesOrders(limit = DEFAULT_ORDER_LIMIT): Promise<SaleOrderRecord[]> {
    this.logger.log(`Fetching ${limit} recent sale orders from Odoo`);

    return this.pool.searchRead<SaleOrderRecord>(SALE_ORDER_MODEL, {
      domain: [['state', '!=', 'cancel']],
      fields: ORDER_FIELDS,
      order: 'date_order desc',
      limit,
    });
  }

  /** POS orders inside the window, newest first. The window defaults to the last 24 hours. */
  async getRecentPosOrders(query: PosOrderQuery = {}): Promise<PosOrderRecord[]> {
    const { start, end } = resolvePosWindow(query.start, query.end);
    const limit = query.limit === undefined ? DEFAULT_ORDER_LIMIT : query.limit;

    const startStr = toOdooDatetime(start);
    const endStr = toOdooDatetime(end);
    this.logger.log(`Fetching POS orders from ${startStr} to ${endStr} (limit ${limit ?? 'none'})`);

    return this.pool.searchRead<PosOrderRecord>(POS_ORDER_MODEL, {
      domain: [
        ['date_order', '>=', startStr],
        ['date_order', '<=', endStr],
        ['state', '!=', 'cancelled'],
      ],
      fields: ORDER_FIELDS,
      order: 'date_order desc',
      limit,
    });
  }

  async getSalesMetrics(query: SalesMetricsQuery = {}): Promise<SalesMetrics> {
    const confirmedOrders = await this.pool.searchCount(SALE_ORDER_MODEL, CONFIRMED_DOMAIN);
    const draftOrders = await this.pool.searchCount(SALE_ORDER_MODEL, DRAFT_DOMAIN);
    const cancelledOrders = await this.pool.searchCount(SALE_ORDER_MODEL, CANCELLED_DOMAIN);

    const aggregation = await this.pool.readGroup(SALE_ORDER_MODEL, CONFIRMED_DOMAIN, ['amount_total:sum'], []);
    const totalAmount = aggregation.length > 0 ? summedAmount(aggregation[0]) : 0;

    const posOrders = await this.getRecentPosOrders({ limit: null, start: query.posStart, end: query.posEnd });
    const posTotalAmount = posOrders.reduce((sum, order) => sum + (Number(order.amount_total) || 0), 0);

    return {
      totalConfirmedOrders: confirmedOrders,
      totalDraftOrders: draftOrders,
      totalCancelledOrders: cancelledOrders,
      totalConfirmedAmount: totalAmount,
      posOrderCount: posOrders.length,
      posTotalAmount,
    };
  }

  checkOdooHealth(): Promise<boolean> {
    return this.pool.ping();
  }
}

/** Odoo 17 names the aggregate `amount_total_sum`; older servers keep the field name. */
function summedAmount(group: ReadGroupRow): number {
  const value = group.amount_total_sum ?? group.amount_total;
  const amount = Number(value);
  return Number.isFinite(amount) ? amount : 0;
}
