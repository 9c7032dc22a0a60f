import { JsonRpcErrorPayload } from './interfaces/odoo.interface';

/** Raised when the application fails to communicate with Odoo. */
export class OdooIntegrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OdooIntegrationError';
  }
}

export class OdooAuthenticationError extends OdooIntegrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OdooAuthenticationError';
  }
}

/** Odoo answered the call with a JSON-RPC error object. */
export class OdooRpcError extends OdooIntegrationError {
  readonly code: number;
  readonly exceptionName: string;

  constructor(message: string, code: number, exceptionName: string) {
    super(message);
    this.name = 'OdooRpcError';
    this.code = code;
    this.exceptionName = exceptionName;
  }

  static fromPayload(payload: JsonRpcErrorPayload): OdooRpcError {
    const message = payload.data?.message || payload.message || 'Unknown Odoo error';
    return new OdooRpcError(message, payload.code, payload.data?.name ?? '');
  }

  /** Servers with `list_db = False` answer `db.list` this way. */
  isAccessDenied(): boolean {
    return /AccessDenied|AccessError/.test(this.exceptionName);
  }
}
