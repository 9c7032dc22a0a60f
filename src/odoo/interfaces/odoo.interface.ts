export type OdooService = 'common' | 'object' | 'db';

/** `[id, display_name]`, or `false` when the relation is empty. */
export type Many2one = [number, string] | false;

export type DomainOperator =
  | '='
  | '!='
  | '>'
  | '>='
  | '<'
  | '<='
  | 'in'
  | 'not in'
  | 'like'
  | 'ilike';

export type DomainValue = string | number | boolean | null | Array<string | number>;

export type DomainLeaf = [string, DomainOperator, DomainValue];

export type Domain = Array<DomainLeaf | '&' | '|' | '!'>;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: 'call';
  params: {
    service: OdooService;
    method: string;
    args: unknown[];
  };
  id: number;
}

export interface JsonRpcErrorPayload {
  code: number;
  message: string;
  data?: {
    name: string;
    message: string;
    debug?: string;
    arguments?: unknown[];
  };
}

export interface JsonRpcResponse<T> {
  jsonrpc: '2.0';
  id: number | null;
  result?: T;
  error?: JsonRpcErrorPayload;
}

export interface OdooVersionInfo {
  server_version: string;
  server_version_info?: Array<string | number>;
  server_serie?: string;
  protocol_version?: number;
}

export interface SearchReadOptions {
  domain?: Domain;
  fields?: string[];
  /** `null` or omitted fetches every matching record. */
  limit?: number | null;
  offset?: number;
  order?: string;
}

export interface ReadGroupOptions {
  limit?: number | null;
  orderby?: string;
  lazy?: boolean;
}

export type ReadGroupRow = Record<string, unknown>;

/** One authenticated handle to Odoo, as handed out by the pool. */
export interface OdooConnection {
  connect(): Promise<void>;
  close(): Promise<void>;
  listDatabases(): Promise<string[]>;
  version(): Promise<OdooVersionInfo>;
  searchRead<T>(model: string, options?: SearchReadOptions): Promise<T[]>;
  searchCount(model: string, domain?: Domain): Promise<number>;
  readGroup(
    model: string,
    domain: Domain,
    fields: string[],
    groupby: string[],
    options?: ReadGroupOptions,
  ): Promise<ReadGroupRow[]>;
}

export type OdooConnectionFactory = () => OdooConnection;

export interface PooledConnection {
  id: number;
  client: OdooConnection;
  createdAt: number;
  lastUsed: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  inUse: number;
  waiting: number;
  min: number;
  max: number;
}

export interface PoolHealth {
  healthy: boolean;
  stats: PoolStats;
}
