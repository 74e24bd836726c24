export { DashboardServer, PUBLIC_DIR, describeApi, toRequestHandler } from './DashboardServer.js';
export type { ApiIndex, DashboardServerConfig } from './DashboardServer.js';
export { launchDashboard } from './launch.js';
export type { DashboardHandle, LaunchOptions } from './launch.js';
export {
    RateLimiter,
    createCorsMiddleware,
    createRateLimitMiddleware,
    errorHandler,
    securityHeaders,
    toErrorResponse
} from './middleware.js';
export type { ErrorResponse } from './middleware.js';
