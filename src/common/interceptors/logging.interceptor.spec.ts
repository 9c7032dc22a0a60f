import { CallHandler, StreamableFile } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { model } from 'mongoose';
import { lastValueFrom, of, throwError } from 'rxjs';
import { LogsService } from '../../logs/logs.service';
import { Log, LogSchema } from '../../logs/schemas/log.schema';
import { LoggingInterceptor, redact } from './logging.interceptor';

function createContext(body: unknown) {
  const request = {
    method: 'POST',
    originalUrl: '/auth/login?next=%2F',
    route: { path: '/auth/login' },
    headers: { 'user-agent': 'jest' },
    body,
    query: { next: '/' },
    ip: '127.0.0.1',
  };
  return new ExecutionContextHost([request, {}]);
}

function handler(result: ReturnType<CallHandler['handle']>): CallHandler {
  return { handle: () => result };
}

describe('LoggingInterceptor', () => {
  let create: jest.Mock;
  let interceptor: LoggingInterceptor;

  beforeEach(async () => {
    create = jest.fn().mockResolvedValue({});

    const module = await Test.createTestingModule({
      providers: [LoggingInterceptor, { provide: LogsService, useValue: { create } }],
    }).compile();

    interceptor = module.get(LoggingInterceptor);
  });

  it('should record successful requests with secrets masked', async () => {
    const context = createContext({ password: 'test-password' });

    await lastValueFrom(interceptor.intercept(context, handler(of({ accessToken: 'test-token', expiresIn: 600 }))));

    expect(create).toHaveBeenCalledWith({
      service: 'api',
      action: 'POST /auth/login',
      status: 'success',
      request: {
        method: 'POST',
        url: '/auth/login?next=%2F',
        body: { password: '[REDACTED]' },
        query: { next: '/' },
      },
      response: { accessToken: '[REDACTED]', expiresIn: 600 },
      metadata: { userAgent: 'jest', ip: '127.0.0.1' },
      duration: expect.any(Number),
    });
  });

  it('should not store file downloads', async () => {
    const context = createContext({});

    await lastValueFrom(interceptor.intercept(context, handler(of(new StreamableFile(Buffer.from('a,b\n'))))));

    expect(create.mock.calls[0][0].response).toEqual({ file: true });
  });

  it('should record failures and pass the error on', async () => {
    const context = createContext({});

    await expect(
      lastValueFrom(interceptor.intercept(context, handler(throwError(() => new Error('boom'))))),
    ).rejects.toThrow('boom');

    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'error', errorMessage: 'boom', action: 'POST /auth/login' }),
    );
  });

  it('should keep serving when the log store fails', async () => {
    create.mockRejectedValue(new Error('mongo down'));
    const context = createContext({});

    await expect(lastValueFrom(interceptor.intercept(context, handler(of({ ok: true }))))).resolves.toEqual({ ok: true });
  });
});

describe('redact', () => {
  it('should mask nested secrets and leave other values alone', () => {
    const when = new Date('2024-05-01T00:00:00Z');

    expect(redact({ user: { password: 'x' }, items: [{ accessToken: 'y', id: 1 }], when, note: null })).toEqual({
      user: { password: '[REDACTED]' },
      items: [{ accessToken: '[REDACTED]', id: 1 }],
      when,
      note: null,
    });
  });

  it('should copy Mongoose documents by their fields', () => {
    const LogModel = model(Log.name, LogSchema);
    const log = new LogModel({
      service: 'odoo',
      action: 'search_read',
      status: 'success',
      request: { model: 'sale.order', password: 'test-password' },
    });

    expect(redact([log])).toEqual([
      {
        _id: log._id.toHexString(),
        service: 'odoo',
        action: 'search_read',
        status: 'success',
        request: { model: 'sale.order', password: '[REDACTED]' },
      },
    ]);
  });

  it('should leave class instances without a JSON form untouched', () => {
    const values = new Map([['password', 'x']]);

    expect(redact({ values })).toEqual({ values });
  });
});
