/**
 * Dashboard launcher tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { launchDashboard } from '../launch.js';
import { getLesson } from '../../lessons/index.js';

const mocks = vi.hoisted(() => ({
    initialize: vi.fn(),
    shutdown: vi.fn(),
    execute: vi.fn(),
    start: vi.fn(),
    stop: vi.fn()
}));

vi.mock('../../utils/logger.js', () => {
    const moduleLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return { logger: { forModule: () => moduleLogger } };
});

vi.mock('../../pool/ConnectionPool.js', () => ({
    ConnectionPool: function () {
        return {
            initialize: mocks.initialize,
            shutdown: mocks.shutdown,
            execute: mocks.execute,
            transaction: vi.fn(),
            recycle: vi.fn()
        };
    }
}));

vi.mock('../DashboardServer.js', () => ({
    DashboardServer: function () {
        return { start: mocks.start, stop: mocks.stop };
    }
}));

const database = { host: 'localhost', port: 5432, user: 'admin', password: 'test-secret', database: 'geospatial_warehouse' };

describe('launchDashboard', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mocks.initialize.mockResolvedValue(undefined);
        mocks.shutdown.mockResolvedValue(undefined);
        mocks.start.mockResolvedValue(undefined);
        mocks.stop.mockResolvedValue(undefined);
        mocks.execute.mockResolvedValue({ rows: [{ cnt: '3', d_geom: '1', d_geog: '1' }], rowCount: 1 });
    });

    it('should prime the demo once the server is up', async () => {
        const handle = await launchDashboard(getLesson('day4'), {
            database,
            server: { port: 3004 },
            primeDemo: true
        });

        expect(handle).not.toBeNull();
        expect(mocks.execute).toHaveBeenCalledWith(expect.stringContaining('ST_Distance'), ['Eiffel Tower', 'Arc de Triomphe']);

        await handle?.close();
        expect(mocks.stop).toHaveBeenCalledOnce();
        expect(mocks.shutdown).toHaveBeenCalledOnce();
    });

    it('should skip an occupied port when asked', async () => {
        mocks.start.mockRejectedValue(Object.assign(new Error('listen EADDRINUSE'), { code: 'EADDRINUSE' }));

        const handle = await launchDashboard(getLesson('day4'), {
            database,
            server: { port: 3004 },
            skipOccupiedPort: true
        });

        expect(handle).toBeNull();
        expect(mocks.shutdown).toHaveBeenCalledOnce();
    });

    it('should fail on an occupied port otherwise', async () => {
        mocks.start.mockRejectedValue(Object.assign(new Error('listen EADDRINUSE'), { code: 'EADDRINUSE' }));

        await expect(launchDashboard(getLesson('day4'), { database, server: { port: 3004 } }))
            .rejects.toThrow('listen EADDRINUSE');
    });

    it('should log a failed priming run and still serve', async () => {
        mocks.execute.mockRejectedValue(new Error('relation "landmarks" does not exist'));

        const handle = await launchDashboard(getLesson('day4'), { database, server: { port: 3004 }, primeDemo: true });

        expect(handle).not.toBeNull();
    });
});
