export const STOCK_RESULTS = Symbol('STOCK_RESULTS');
