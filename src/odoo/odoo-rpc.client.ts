import { Logger } from '@nestjs/common';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { OdooSettings, odooBaseUrl } from '../config/odoo.config';
import { errorMessage } from '../common/utils/error.util';
import { OdooAuthenticationError, OdooIntegrationError, OdooRpcError } from './odoo.errors';
import {
  Domain,
  JsonRpcRequest,
  JsonRpcResponse,
  OdooConnection,
  OdooConnectionFactory,
  OdooService,
  OdooVersionInfo,
  ReadGroupOptions,
  ReadGroupRow,
  SearchReadOptions,
} from './interfaces/odoo.interface';

export interface OdooRpcClientOptions {
  baseUrl: string;
  database: string;
  username: string;
  apiKey: string;
  /** Prefix the server's `server_version` must start with, if set. */
  expectedVersion?: string;
  timeoutMs: number;
}

/**
 * Single JSON-RPC handle to Odoo. Logs in once with the API key and then
 * issues `execute_kw` calls on behalf of that uid.
 */
export class OdooRpcClient implements OdooConnection {
  private readonly logger = new Logger(OdooRpcClient.name);
  private readonly apiClient: AxiosInstance;
  private uid: number | null = null;
  private requestId = 0;

  constructor(
    private readonly options: OdooRpcClientOptions,
    apiClient?: AxiosInstance,
  ) {
    this.apiClient =
      apiClient ??
      axios.create({
        baseURL: options.baseUrl,
        headers: {
          'Content-Type': 'application/json',
        },
        timeout: options.timeoutMs,
      });
  }

  get isAuthenticated(): boolean {
    return this.uid !== null;
  }

  async call<T>(service: OdooService, method: string, args: unknown[]): Promise<T> {
    const payload: JsonRpcRequest = {
      jsonrpc: '2.0',
      method: 'call',
      params: { service, method, args },
      id: ++this.requestId,
    };

    let body: JsonRpcResponse<T>;
    try {
      const response = await this.apiClient.post<JsonRpcResponse<T>>('/jsonrpc', payload);
      body = response.data;
    } catch (error) {
      throw new OdooIntegrationError(`Odoo request ${service}.${method} failed: ${describeTransportError(error)}`, {
        cause: error,
      });
    }

    if (body.error) {
      throw OdooRpcError.fromPayload(body.error);
    }
    if (body.result === undefined) {
      throw new OdooIntegrationError(`Odoo request ${service}.${method} returned no result`);
    }
    return body.result;
  }

  async connect(): Promise<void> {
    if (this.options.expectedVersion) {
      const info = await this.version();
      if (!info.server_version.startsWith(this.options.expectedVersion)) {
        throw new OdooIntegrationError(
          `Odoo server version ${info.server_version} does not match expected ${this.options.expectedVersion}`,
        );
      }
    }

    await this.login();
  }

  async login(): Promise<number> {
    this.logger.debug(`Authenticating with Odoo as ${this.options.username}...`);

    const uid = await this.call<number | false>('common', 'login', [
      this.options.database,
      this.options.username,
      this.options.apiKey,
    ]);

    if (!uid) {
      throw new OdooAuthenticationError(
        `Odoo rejected the credentials for ${this.options.username} on database ${this.options.database}`,
      );
    }

    this.uid = uid;
    return uid;
  }

  /** API-key sessions are stateless, so there is nothing to tell the server. */
  async close(): Promise<void> {
    this.uid = null;
  }

  version(): Promise<OdooVersionInfo> {
    return this.call<OdooVersionInfo>('common', 'version', []);
  }

  listDatabases(): Promise<string[]> {
    return this.call<string[]>('db', 'list', []);
  }

  executeKw<T>(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown> = {},
  ): Promise<T> {
    if (this.uid === null) {
      return Promise.reject(new OdooIntegrationError('Odoo client is not logged in.'));
    }

    return this.call<T>('object', 'execute_kw', [
      this.options.database,
      this.uid,
      this.options.apiKey,
      model,
      method,
      args,
      kwargs,
    ]);
  }

  searchRead<T>(model: string, options: SearchReadOptions = {}): Promise<T[]> {
    const kwargs: Record<string, unknown> = {
      domain: options.domain ?? [],
      fields: options.fields ?? [],
      offset: options.offset ?? 0,
    };
    if (options.limit !== undefined && options.limit !== null) {
      kwargs.limit = options.limit;
    }
    if (options.order) {
      kwargs.order = options.order;
    }

    return this.executeKw<T[]>(model, 'search_read', [], kwargs);
  }

  searchCount(model: string, domain: Domain = []): Promise<number> {
    return this.executeKw<number>(model, 'search_count', [domain]);
  }

  readGroup(
    model: string,
    domain: Domain,
    fields: string[],
    groupby: string[],
    options: ReadGroupOptions = {},
  ): Promise<ReadGroupRow[]> {
    const kwargs: Record<string, unknown> = { lazy: options.lazy ?? true };
    if (options.limit !== undefined && options.limit !== null) {
      kwargs.limit = options.limit;
    }
    if (options.orderby) {
      kwargs.orderby = options.orderby;
    }

    return this.executeKw<ReadGroupRow[]>(model, 'read_group', [domain, fields, groupby], kwargs);
  }
}

function describeTransportError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    return error.code ?? error.message;
  }
  return errorMessage(error);
}

export function createOdooConnectionFactory(settings: OdooSettings): OdooConnectionFactory {
  const baseUrl = odooBaseUrl(settings);

  return () =>
    new OdooRpcClient({
      baseUrl,
      database: settings.database,
      username: settings.username,
      apiKey: settings.apiKey,
      expectedVersion: settings.version,
      timeoutMs: settings.requestTimeout * 1000,
    });
}
