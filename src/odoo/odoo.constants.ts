export const ODOO_SETTINGS = Symbol('ODOO_SETTINGS');
export const ODOO_CONNECTION_FACTORY = Symbol('ODOO_CONNECTION_FACTORY');

export const ODOO_HEALTH_QUEUE = 'odoo-health';
export const ODOO_HEALTH_JOB = 'health-check';

export const SALE_ORDER_MODEL = 'sale.order';
export const POS_ORDER_MODEL = 'pos.order';
