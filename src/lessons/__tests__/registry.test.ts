/**
 * Lesson catalogue tests
 */

import { describe, it, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { getLesson, listLessons, lessonLabel } from '../registry.js';
import { sqlPath } from '../sql.js';
import { LessonNotFoundError } from '../../types/index.js';

describe('lesson registry', () => {
    it('should list all six lessons in order', () => {
        expect(listLessons().map((lesson) => lesson.id)).toEqual(['day1', 'day2', 'day3', 'day4', 'day5', 'day6']);
    });

    it.each(['day3', 'Day3', 'DAY3', '3', ' 3 ', '03'])('should resolve %j to day3', (id) => {
        expect(getLesson(id).id).toBe('day3');
    });

    it('should reject unknown lessons with the available ids', () => {
        expect(() => getLesson('day7')).toThrow(LessonNotFoundError);
        expect(() => getLesson('day7')).toThrow(
            "Unknown lesson 'day7'. Available lessons: day1, day2, day3, day4, day5, day6"
        );
    });

    it('should label lessons for dashboard messages', () => {
        expect(lessonLabel(getLesson('day2'))).toBe('Day2');
    });

    it.each([
        ['day1', 'postgis_geospatial_day1_container', 'postgis/postgis:16-3.4', 3000],
        ['day2', 'geospatial_pg17', 'postgis/postgis:17-3.5', 3001],
        ['day3', 'postgis_day3_db', 'postgis/postgis:16-3.4', 3002],
        ['day4', 'postgis_geodebate_db', 'postgis/postgis:16-3.4', 3004],
        ['day5', 'postgis_container', 'postgis/postgis:15-3.3', 3005],
        ['day6', 'pg_geospatial_day6', 'postgis/postgis:latest', 3006]
    ] as const)('%s should run %s from %s with its dashboard on %d', (id, container, image, port) => {
        const lesson = getLesson(id);
        expect(lesson.container.name).toBe(container);
        expect(lesson.container.image).toBe(image);
        expect(lesson.dashboard.port).toBe(port);
        expect(lesson.database.port).toBe(5432);
    });

    it('should ship every SQL file a lesson refers to', () => {
        for (const lesson of listLessons()) {
            const steps = [...lesson.setup, ...(lesson.demo.kind === 'psql' ? lesson.demo.steps : [])];
            const files = [
                ...steps.flatMap((step) => ('file' in step ? [step.file] : [])),
                ...lesson.artifacts.flatMap((artifact) => (artifact.kind === 'sql' ? [artifact.source] : []))
            ];
            for (const file of files) {
                expect(existsSync(sqlPath(lesson.id, file)), `${lesson.id}/${file}`).toBe(true);
            }
        }
    });

    it('should only put compose lessons behind a compose directory', () => {
        for (const lesson of listLessons()) {
            expect(lesson.container.composeDir !== undefined).toBe(lesson.container.mode === 'compose');
        }
    });
});
