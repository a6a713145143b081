/**
 * Mock Express request and response objects
 */

import type { Request, Response } from 'express';

export type MockResponse = Response & {
  _json: unknown;
  _status: number;
  _body: unknown;
  _type: string | null;
  _headers: Record<string, string>;
  _listeners: Record<string, Array<() => void>>;
};

/**
 * Create a mock Express request
 */
export function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    body: {},
    params: {},
    query: {},
    headers: {},
    method: 'GET',
    path: '/',
    originalUrl: '/',
    ...overrides,
  } as Request;
}

/**
 * Create a mock Express response recording what the handler sent
 */
export function createMockResponse(): MockResponse {
  const res = {
    _json: null as unknown,
    _status: 200,
    _body: null as unknown,
    _type: null as string | null,
    _headers: {} as Record<string, string>,
    _listeners: {} as Record<string, Array<() => void>>,
    locals: {},
    statusCode: 200,
    status(code: number) {
      this._status = code;
      this.statusCode = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    type(value: string) {
      this._type = value;
      return this;
    },
    send(body: unknown) {
      this._body = body;
      return this;
    },
    setHeader(name: string, value: string) {
      this._headers[name] = value;
      return this;
    },
    getHeader(name: string) {
      return this._headers[name];
    },
    on(event: string, listener: () => void) {
      (this._listeners[event] ??= []).push(listener);
      return this;
    },
    emit(event: string) {
      for (const listener of this._listeners[event] ?? []) listener();
      return true;
    },
  };
  return res as unknown as MockResponse;
}
