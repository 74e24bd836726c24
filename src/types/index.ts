/**
 * postgis-lab - Type Definitions
 *
 * Database, lesson and error types shared across the CLI, provisioner and dashboards.
 */

export type {
    DatabaseConfig,
    PoolStats,
    HealthStatus,
    Row,
    ExecuteResult,
    QueryExecutor,
    PooledExecutor
} from './database.js';

export type {
    LessonId,
    LessonDatabase,
    HealthCheckSpec,
    VolumeMount,
    ContainerSpec,
    LessonArtifact,
    PsqlStep,
    DemoPlan,
    VerificationCheck,
    MetricDescriptor,
    ActionField,
    ActionDescriptor,
    ListDescriptor,
    DashboardDescriptor,
    RouteContext,
    RouteDefinition,
    LessonDefinition
} from './lessons.js';

export {
    PostgisLabError,
    ConnectionError,
    PoolError,
    QueryError,
    ValidationError,
    DockerError,
    DockerNotInstalledError,
    ProvisioningError,
    LessonNotFoundError,
    NotFoundError
} from './errors.js';
