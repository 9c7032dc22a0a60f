import { Many2one } from '../../odoo/interfaces/odoo.interface';

export type SaleOrderState = 'draft' | 'sent' | 'sale' | 'done' | 'cancel';
export type PosOrderState = 'draft' | 'cancel' | 'cancelled' | 'paid' | 'done' | 'invoiced';

export interface OrderRecord<TState extends string = string> {
  id: number;
  name: string;
  /** Odoo UTC datetime, `yyyy-MM-dd HH:mm:ss`. */
  date_order: string;
  amount_total: number | false;
  state: TState;
  partner_id: Many2one;
}

export type SaleOrderRecord = OrderRecord<SaleOrderState>;
export type PosOrderRecord = OrderRecord<PosOrderState>;

export interface SalesMetrics {
  totalConfirmedOrders: number;
  totalDraftOrders: number;
  totalCancelledOrders: number;
  totalConfirmedAmount: number;
  posOrderCount: number;
  posTotalAmount: number;
}

export interface PosOrderQuery {
  /** `null` fetches every order in the window. Defaults to 10. */
  limit?: number | null;
  start?: Date;
  end?: Date;
}

export interface SalesMetricsQuery {
  posStart?: Date;
  posEnd?: Date;
}
