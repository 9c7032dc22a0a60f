export const SALES_REPORTS = Symbol('SALES_REPORTS');
