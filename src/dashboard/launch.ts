/**
 * postgis-lab - Dashboard launcher
 *
 * Opens the lesson's connection pool, mounts its routes and serves them.
 */

import { ConnectionPool } from '../pool/ConnectionPool.js';
import type { DatabaseConfig, LessonDefinition } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DashboardServer } from './DashboardServer.js';
import type { DashboardServerConfig } from './DashboardServer.js';

const log = logger.forModule('DASHBOARD');

export interface LaunchOptions {
    database: DatabaseConfig;
    server: DashboardServerConfig;
    /** Run the lesson demo once so the first poll shows real numbers */
    primeDemo?: boolean;
    /** Log and return null instead of failing when the port is taken */
    skipOccupiedPort?: boolean;
}

export interface DashboardHandle {
    server: DashboardServer;
    pool: ConnectionPool;
    close(): Promise<void>;
}

function isAddressInUse(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EADDRINUSE';
}

export async function launchDashboard(lesson: LessonDefinition, options: LaunchOptions): Promise<DashboardHandle | null> {
    const pool = new ConnectionPool({ ...options.database, applicationName: `postgis-lab-${lesson.id}` });
    await pool.initialize();

    const routes = lesson.createRoutes({ executor: pool });
    const server = new DashboardServer(lesson, routes, options.server);

    try {
        await server.start();
    } catch (error) {
        await pool.shutdown();
        if (options.skipOccupiedPort && isAddressInUse(error)) {
            log.warn(`Port ${String(options.server.port)} is in use; not starting the ${lesson.id} dashboard`, {
                lessonId: lesson.id
            });
            return null;
        }
        throw error;
    }

    if (options.primeDemo) {
        const demo = routes.find((route) => route.method === 'POST' && route.path === '/run-demo');
        if (demo) {
            try {
                await demo.handler({});
            } catch (error) {
                log.warn('Initial demo run failed; metrics stay at zero until the next run', {
                    lessonId: lesson.id,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
    }

    return {
        server,
        pool,
        close: async () => {
            await server.stop();
            await pool.shutdown();
        }
    };
}
