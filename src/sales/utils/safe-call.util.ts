import { OdooIntegrationError } from '../../odoo/odoo.errors';

/** Returns `fallback` when Odoo is unreachable; other errors propagate. */
export async function safeCall<T>(fn: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof OdooIntegrationError) {
      return fallback;
    }
    throw error;
  }
}
