/**
 * postgis-lab - Express request/response mocks
 *
 * Enough of express's Request and Response to drive dashboard middleware
 * and route handlers without binding a port.
 */

import { vi } from 'vitest';
import type { Request, Response } from 'express';

export interface MockRequestInit {
    method?: string;
    path?: string;
    ip?: string;
    headers?: Record<string, string>;
    body?: unknown;
}

export function createMockRequest(init: MockRequestInit = {}): Request {
    const headers = init.headers ?? {};
    return {
        method: init.method ?? 'GET',
        path: init.path ?? '/',
        originalUrl: init.path ?? '/',
        ip: init.ip ?? '127.0.0.1',
        headers,
        body: init.body,
        socket: { remoteAddress: init.ip ?? '127.0.0.1' },
        get: (name: string) => headers[name.toLowerCase()]
    } as unknown as Request;
}

export type MockResponse = Response & {
    _headers: Record<string, string>;
    _statusCode: number;
    _body: unknown;
    _ended: boolean;
};

export function createMockResponse(): MockResponse {
    const headers: Record<string, string> = {};
    const res = {
        _headers: headers,
        _statusCode: 200,
        _body: undefined as unknown,
        _ended: false,
        headersSent: false,
        setHeader: vi.fn((name: string, value: string) => {
            headers[name.toLowerCase()] = value;
            return res;
        }),
        getHeader: vi.fn((name: string) => headers[name.toLowerCase()]),
        status: vi.fn((code: number) => {
            res._statusCode = code;
            return res;
        }),
        json: vi.fn((body: unknown) => {
            res._body = body;
            res._ended = true;
            res.headersSent = true;
            return res;
        }),
        sendStatus: vi.fn((code: number) => {
            res._statusCode = code;
            res._ended = true;
            res.headersSent = true;
            return res;
        }),
        end: vi.fn(() => {
            res._ended = true;
            res.headersSent = true;
            return res;
        })
    };
    return res as unknown as MockResponse;
}
