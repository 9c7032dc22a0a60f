/** Local wall-clock bounds of the POS window, in the dashboard time zone. */
export interface PosFilterState {
  startDate: string;
  startTime: string;
  endDate: string;
  endTime: string;
}

export interface PosWindow {
  filter: PosFilterState;
  start: Date;
  end: Date;
  caption: string;
}

export interface DashboardStatus {
  connected: boolean;
  label: 'Connected' | 'Not connected';
}

export interface KpiCard {
  title: string;
  value: string;
}

export interface OrderRow {
  orderNumber: string;
  customer: string;
  amount: number;
  status: string;
  date: string;
}

export interface DashboardView {
  status: DashboardStatus;
  kpis: KpiCard[];
  window: {
    filter: PosFilterState;
    startUtc: string;
    endUtc: string;
    caption: string;
  };
  orders: OrderRow[];
  errors: string[];
  emptyMessage: string | null;
}
