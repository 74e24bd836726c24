/**
 * postgis-lab - Dashboard server
 *
 * Express app serving one lesson: the generic page from public/, the
 * lesson descriptor, and the lesson's own JSON routes under /api.
 */

import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import express from 'express';
import type { Express, RequestHandler, Router } from 'express';
import type { LessonDefinition, RouteDefinition } from '../types/index.js';
import { lessonLabel } from '../lessons/registry.js';
import { logger } from '../utils/logger.js';
import {
    RateLimiter,
    createCorsMiddleware,
    createRateLimitMiddleware,
    errorHandler,
    securityHeaders
} from './middleware.js';

const log = logger.forModule('DASHBOARD');

export const PUBLIC_DIR = fileURLToPath(new URL('../../public/', import.meta.url));

/**
 * Dashboard server configuration
 */
export interface DashboardServerConfig {
    port: number;

    /** Host to bind to (default: 0.0.0.0) */
    host?: string | undefined;

    /** CORS allowed origins (default: none); `*` allows any */
    corsOrigins?: string[] | undefined;

    /** Enable rate limiting (default: true) */
    enableRateLimit?: boolean | undefined;

    /** Rate limit window in milliseconds (default: 60000 = 1 minute) */
    rateLimitWindowMs?: number | undefined;

    /** Maximum requests per window per IP (default: 300) */
    rateLimitMaxRequests?: number | undefined;

    /** JSON body limit (default: 1mb) */
    maxBodySize?: string | undefined;

    publicDir?: string | undefined;
}

export interface ApiIndex {
    ok: true;
    message: string;
    endpoints: string[];
}

export function describeApi(lesson: LessonDefinition, routes: readonly RouteDefinition[]): ApiIndex {
    return {
        ok: true,
        message: `${lessonLabel(lesson)} dashboard API`,
        endpoints: [
            'GET /api/health',
            'GET /api/lesson',
            ...routes.map((route) => `${route.method} /api${route.path}`)
        ]
    };
}

/**
 * Adapt a lesson route to express. POST handlers receive the parsed JSON body.
 */
export function toRequestHandler(route: RouteDefinition): RequestHandler {
    return (req, res, next) => {
        const body: unknown = route.method === 'POST' ? req.body ?? {} : undefined;
        route.handler(body)
            .then((result) => {
                res.json(result);
            })
            .catch(next);
    };
}

export class DashboardServer {
    private server: Server | null = null;
    readonly app: Express;
    private readonly config: DashboardServerConfig;

    private static readonly DEFAULT_RATE_LIMIT_WINDOW_MS = 60000;
    private static readonly DEFAULT_RATE_LIMIT_MAX_REQUESTS = 300;

    constructor(
        private readonly lesson: LessonDefinition,
        private readonly routes: readonly RouteDefinition[],
        config: DashboardServerConfig
    ) {
        this.config = {
            ...config,
            host: config.host ?? '0.0.0.0',
            corsOrigins: config.corsOrigins ?? [],
            enableRateLimit: config.enableRateLimit ?? true,
            rateLimitWindowMs: config.rateLimitWindowMs ?? DashboardServer.DEFAULT_RATE_LIMIT_WINDOW_MS,
            rateLimitMaxRequests: config.rateLimitMaxRequests ?? DashboardServer.DEFAULT_RATE_LIMIT_MAX_REQUESTS,
            maxBodySize: config.maxBodySize ?? '1mb',
            publicDir: config.publicDir ?? PUBLIC_DIR
        };
        this.app = this.createApp();
    }

    /** Bound port once listening, so port 0 reports the one the OS chose */
    get port(): number {
        const address = this.server?.address();
        return address !== null && typeof address === 'object' ? address.port : this.config.port;
    }

    get url(): string {
        return `http://localhost:${String(this.port)}`;
    }

    async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.config.port, this.config.host ?? '0.0.0.0');

            server.once('error', reject);
            server.once('listening', () => {
                server.off('error', reject);
                server.on('error', (error) => {
                    log.error('Dashboard server error', { error: error.message });
                });
                this.server = server;
                log.info(`${this.lesson.title} dashboard listening on ${this.url}`, { lessonId: this.lesson.id });
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) {
            return;
        }
        return new Promise((resolve, reject) => {
            server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                log.info('Dashboard stopped', { lessonId: this.lesson.id });
                resolve();
            });
        });
    }

    private createApp(): Express {
        const app = express();
        app.disable('x-powered-by');

        app.use(securityHeaders);
        app.use(createCorsMiddleware(this.config.corsOrigins ?? []));
        if (this.config.enableRateLimit) {
            app.use(createRateLimitMiddleware(new RateLimiter(
                this.config.rateLimitWindowMs ?? DashboardServer.DEFAULT_RATE_LIMIT_WINDOW_MS,
                this.config.rateLimitMaxRequests ?? DashboardServer.DEFAULT_RATE_LIMIT_MAX_REQUESTS
            )));
        }
        app.use(express.json({ limit: this.config.maxBodySize }));

        app.get('/health', (_req, res) => {
            res.json({ status: 'healthy', timestamp: new Date().toISOString() });
        });
        app.use('/api', this.createApiRouter());
        app.use(express.static(this.config.publicDir ?? PUBLIC_DIR));
        app.use(errorHandler);

        return app;
    }

    private createApiRouter(): Router {
        const api = express.Router();
        const index = describeApi(this.lesson, this.routes);

        api.get('/health', (_req, res) => {
            res.json(index);
        });
        api.get('/lesson', (_req, res) => {
            res.json({
                id: this.lesson.id,
                summary: this.lesson.summary,
                ...this.lesson.dashboard
            });
        });

        for (const route of this.routes) {
            if (route.method === 'GET') {
                api.get(route.path, toRequestHandler(route));
            } else {
                api.post(route.path, toRequestHandler(route));
            }
        }

        api.use((req, res) => {
            res.status(404).json({ error: `Not found: ${req.method} /api${req.path}` });
        });
        return api;
    }
}
