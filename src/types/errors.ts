/**
 * postgis-lab - Error Types
 *
 * Custom error classes for lesson provisioning, Docker and database operations.
 */

/**
 * Base error class for postgis-lab
 */
export class PostgisLabError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PostgisLabError";
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

/**
 * Connection pool error
 */
export class PoolError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "POOL_ERROR", details);
    this.name = "PoolError";
  }
}

/**
 * Query execution error
 */
export class QueryError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "QUERY_ERROR", details);
    this.name = "QueryError";
  }
}

/**
 * Validation error for input parameters
 */
export class ValidationError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * A docker / docker compose invocation exited non-zero or timed out
 */
export class DockerError extends PostgisLabError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "DOCKER_ERROR", { exitCode, ...details });
    this.name = "DockerError";
  }
}

/**
 * The docker binary could not be found
 */
export class DockerNotInstalledError extends PostgisLabError {
  constructor(binPath: string) {
    super(
      `Docker is not installed or '${binPath}' is not on PATH. Install Docker and try again.`,
      "DOCKER_NOT_INSTALLED",
      { binPath },
    );
    this.name = "DockerNotInstalledError";
  }
}

/**
 * A lesson setup/start step failed
 */
export class ProvisioningError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PROVISIONING_ERROR", details);
    this.name = "ProvisioningError";
  }
}

/**
 * Unknown lesson id
 */
export class LessonNotFoundError extends PostgisLabError {
  constructor(lessonId: string, known: readonly string[]) {
    super(
      `Unknown lesson '${lessonId}'. Available lessons: ${known.join(", ")}`,
      "LESSON_NOT_FOUND",
      { lessonId },
    );
    this.name = "LessonNotFoundError";
  }
}

/**
 * A requested row or resource does not exist
 */
export class NotFoundError extends PostgisLabError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}
