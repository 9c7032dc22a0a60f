export type CellValue = string | number;
export type StockRow = Record<string, CellValue>;

/** Rows keyed by column name, with the column order kept separately. */
export interface StockTable {
  columns: string[];
  rows: StockRow[];
}

export const STOCK_SORT_OPTIONS = ['Urgency', 'Brand/Name'] as const;
export type StockSortOption = (typeof STOCK_SORT_OPTIONS)[number];

export interface ReconcileOptions {
  includeSource: boolean;
  sort: StockSortOption;
}

export interface StockMetrics {
  totalRows: number;
  totalColumns: number;
  maxArea: number | null;
  urgentCount: number | null;
}

export interface StatusBreakdown {
  status: string;
  count: number;
  percentage: number;
}

export interface ReconcileResult extends StockTable {
  metrics: StockMetrics;
  statusAnalysis: StatusBreakdown[] | null;
}
