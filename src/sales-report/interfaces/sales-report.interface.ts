import { SheetCell } from '../../common/utils/workbook.util';

export const REQUIRED_SALES_COLUMNS = [
  'Order Date',
  'Product/Barcode',
  'Product',
  'Parent Brand',
  'Brand',
  'Quantity',
  'Tax Incl.',
] as const;

/** Parent brands whose report is split into one workbook per brand. */
export const SPLIT_BY_BRAND_PARENTS = ['Paragon', 'Hebe'];

/** One sales line with the required columns parsed and every column kept. */
export interface SalesLine {
  orderDate: Date;
  barcode: string;
  product: string;
  parentBrand: string | null;
  brand: string | null;
  quantity: number;
  taxIncluded: number;
  values: Record<string, SheetCell>;
}

export interface SalesSheet {
  columns: string[];
  lines: SalesLine[];
}

export interface BrandGroup {
  key: string;
  parentBrand: string;
  lines: SalesLine[];
}

export interface PivotRow {
  barcode: string;
  product: string;
  quantities: Record<string, number>;
  totals: Record<string, number>;
}

/** Quantity and revenue per barcode and day (`yyyy-MM-dd`). */
export interface BarcodePivot {
  days: string[];
  rows: PivotRow[];
}

export interface SalesReportOptions {
  separateByDate: boolean;
}

export interface SalesReportSummary {
  totalRows: number;
  parentBrandsCount: number;
  workbooksCount: number;
  dateRange: { start: string; end: string };
  parentBrands: string[];
  workbookKeys: string[];
}

export interface SalesReportWorkbook {
  key: string;
  fileName: string;
  content: Buffer;
}

export interface SalesReport {
  summary: SalesReportSummary;
  workbooks: SalesReportWorkbook[];
  createdAt: Date;
}

export interface SalesReportView {
  summary: SalesReportSummary;
  createdAt: string;
  workbooks: { key: string; fileName: string; size: number }[];
}
