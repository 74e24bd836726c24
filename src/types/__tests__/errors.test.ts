/**
 * postgis-lab - Error Types Unit Tests
 *
 * Tests for custom error classes covering construction,
 * error codes, details, inheritance, and name properties.
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../errors.js';

describe('PostgisLabError', () => {
    it('should create error with message and code', () => {
        const error = new PostgisLabError('Test error', 'TEST_CODE');

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('Test error');
        expect(error.code).toBe('TEST_CODE');
        expect(error.name).toBe('PostgisLabError');
        expect(error.details).toBeUndefined();
    });

    it('should carry details', () => {
        const error = new PostgisLabError('Test error', 'TEST_CODE', { lesson: 'day1' });

        expect(error.details).toEqual({ lesson: 'day1' });
    });

    it('should be throwable and catchable', () => {
        expect(() => {
            throw new PostgisLabError('Thrown error', 'THROWN_CODE');
        }).toThrow(PostgisLabError);
    });
});

describe('simple subclasses', () => {
    it.each([
        [ConnectionError, 'CONNECTION_ERROR', 'ConnectionError'],
        [PoolError, 'POOL_ERROR', 'PoolError'],
        [QueryError, 'QUERY_ERROR', 'QueryError'],
        [ValidationError, 'VALIDATION_ERROR', 'ValidationError'],
        [ProvisioningError, 'PROVISIONING_ERROR', 'ProvisioningError'],
        [NotFoundError, 'NOT_FOUND', 'NotFoundError']
    ] as const)('%o uses code %s', (ErrorClass, code, name) => {
        const error = new ErrorClass('failed', { step: 3 });

        expect(error).toBeInstanceOf(PostgisLabError);
        expect(error.code).toBe(code);
        expect(error.name).toBe(name);
        expect(error.details).toEqual({ step: 3 });
    });
});

describe('DockerError', () => {
    it('should expose exit code and stderr', () => {
        const error = new DockerError('docker run failed', 125, 'port is already allocated', { container: 'c1' });

        expect(error.code).toBe('DOCKER_ERROR');
        expect(error.exitCode).toBe(125);
        expect(error.stderr).toBe('port is already allocated');
        expect(error.details).toEqual({ exitCode: 125, container: 'c1' });
    });

    it('should accept a null exit code for timeouts', () => {
        const error = new DockerError('timed out', null, '');

        expect(error.exitCode).toBeNull();
        expect(error.details).toEqual({ exitCode: null });
    });
});

describe('DockerNotInstalledError', () => {
    it('should name the binary', () => {
        const error = new DockerNotInstalledError('docker');

        expect(error.code).toBe('DOCKER_NOT_INSTALLED');
        expect(error.message).toBe("Docker is not installed or 'docker' is not on PATH. Install Docker and try again.");
        expect(error.details).toEqual({ binPath: 'docker' });
    });
});

describe('LessonNotFoundError', () => {
    it('should list the known lessons', () => {
        const error = new LessonNotFoundError('day9', ['day1', 'day2']);

        expect(error.code).toBe('LESSON_NOT_FOUND');
        expect(error.message).toBe("Unknown lesson 'day9'. Available lessons: day1, day2");
        expect(error.details).toEqual({ lessonId: 'day9' });
    });
});
