/**
 * postgis-lab - Lesson catalogue
 */

import type { LessonDefinition } from '../types/index.js';
import { LessonNotFoundError } from '../types/index.js';
import { day1 } from './day1/index.js';
import { day2 } from './day2/index.js';
import { day3 } from './day3/index.js';
import { day4 } from './day4/index.js';
import { day5 } from './day5/index.js';
import { day6 } from './day6/index.js';

const LESSONS: readonly LessonDefinition[] = [day1, day2, day3, day4, day5, day6];

export function listLessons(): readonly LessonDefinition[] {
    return LESSONS;
}

/**
 * Look a lesson up by `day3`, `Day3` or plain `3`
 */
export function getLesson(id: string): LessonDefinition {
    const normalized = id.trim().toLowerCase();
    const key = /^\d+$/.test(normalized) ? `day${String(parseInt(normalized, 10))}` : normalized;
    const lesson = LESSONS.find((candidate) => candidate.id === key);
    if (!lesson) {
        throw new LessonNotFoundError(id, LESSONS.map((candidate) => candidate.id));
    }
    return lesson;
}

/** "day2" becomes "Day2" */
export function lessonLabel(lesson: LessonDefinition): string {
    return lesson.id.charAt(0).toUpperCase() + lesson.id.slice(1);
}
