/**
 * postgis-lab - Dashboard middleware
 *
 * Security headers, CORS, per-IP rate limiting and error mapping for the
 * lesson dashboards.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { NotFoundError, ValidationError } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('DASHBOARD');

/** The API serves JSON only; the page loads its own script and stylesheet */
const API_CSP = "default-src 'none'; frame-ancestors 'none'";
const PAGE_CSP = "default-src 'self'; frame-ancestors 'none'";

function isApiPath(pathname: string): boolean {
    return pathname === '/health' || pathname === '/api' || pathname.startsWith('/api/');
}

export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Referrer-Policy', 'no-referrer');

    if (isApiPath(req.path)) {
        res.setHeader('Content-Security-Policy', API_CSP);
        // Metrics change on every poll
        res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, max-age=0');
        res.setHeader('Pragma', 'no-cache');
        res.setHeader('Expires', '0');
    } else {
        res.setHeader('Content-Security-Policy', PAGE_CSP);
    }
    next();
}

/**
 * CORS for configured origins only; `*` admits any origin
 */
export function createCorsMiddleware(origins: readonly string[]): RequestHandler {
    const allowAny = origins.includes('*');

    return (req, res, next) => {
        const origin = req.headers.origin;
        const allowed = origin !== undefined && (allowAny || origins.includes(origin));

        if (allowed) {
            res.setHeader('Access-Control-Allow-Origin', allowAny ? '*' : origin);
            res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
            res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
            res.setHeader('Access-Control-Max-Age', '86400');
            // Vary header is important for correct caching behavior
            res.setHeader('Vary', 'Origin');
        }

        // Preflights from other origins fall through without CORS headers
        if (req.method === 'OPTIONS' && allowed) {
            res.status(204).end();
            return;
        }
        next();
    };
}

interface RateLimitEntry {
    count: number;
    resetTime: number;
}

/**
 * Fixed-window request counter per client
 */
export class RateLimiter {
    private readonly entries = new Map<string, RateLimitEntry>();

    constructor(
        private readonly windowMs: number,
        private readonly maxRequests: number,
        private readonly now: () => number = Date.now
    ) { }

    /**
     * Count a request from `key`; false once the window is used up
     */
    allow(key: string): boolean {
        const now = this.now();

        // Clean up expired entries once the map grows
        if (this.entries.size > 100) {
            for (const [client, entry] of this.entries) {
                if (now > entry.resetTime) {
                    this.entries.delete(client);
                }
            }
        }

        const entry = this.entries.get(key);
        if (!entry || now > entry.resetTime) {
            this.entries.set(key, { count: 1, resetTime: now + this.windowMs });
            return true;
        }
        if (entry.count >= this.maxRequests) {
            return false;
        }
        entry.count++;
        return true;
    }

    get size(): number {
        return this.entries.size;
    }
}

export function createRateLimitMiddleware(limiter: RateLimiter): RequestHandler {
    return (req, res, next) => {
        const clientIp = req.ip ?? req.socket.remoteAddress ?? 'unknown';
        if (!limiter.allow(clientIp)) {
            log.warn('Rate limit exceeded', { clientIp, path: req.path });
            res.status(429).json({
                error: 'rate_limit_exceeded',
                error_description: 'Too many requests. Please try again later.'
            });
            return;
        }
        next();
    };
}

export interface ErrorResponse {
    status: number;
    body: { error: string };
}

/** Status set by body-parser on malformed or oversized bodies */
function clientErrorStatus(error: unknown): number | undefined {
    if (error instanceof Error && 'status' in error && typeof error.status === 'number'
        && error.status >= 400 && error.status < 500) {
        return error.status;
    }
    return undefined;
}

export function toErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof ValidationError) {
        return { status: 400, body: { error: error.message } };
    }
    if (error instanceof ZodError) {
        const message = error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        return { status: 400, body: { error: message } };
    }
    if (error instanceof NotFoundError) {
        return { status: 404, body: { error: error.message } };
    }
    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== undefined && error instanceof Error) {
        return { status: clientStatus, body: { error: error.message } };
    }

    const message = error instanceof Error ? error.message : String(error);
    log.error('Dashboard request failed', { error: message });
    return { status: 500, body: { error: message } };
}

export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(error);
        return;
    }
    const { status, body } = toErrorResponse(error);
    res.status(status).json(body);
}
