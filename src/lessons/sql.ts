/**
 * postgis-lab - SQL assets
 *
 * Lesson SQL ships as plain files under sql/<lesson>/ next to the package.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LessonId } from '../types/index.js';
import { NotFoundError, ValidationError } from '../types/index.js';

export const SQL_ROOT = fileURLToPath(new URL('../../sql/', import.meta.url));

export function sqlPath(lessonId: LessonId, file: string): string {
    if (file !== path.basename(file) || !file.endsWith('.sql')) {
        throw new ValidationError(`Invalid SQL file name: ${file}`, { lessonId, file });
    }
    return path.join(SQL_ROOT, lessonId, file);
}

/**
 * Text of sql/<lessonId>/<file>
 */
export async function loadSql(lessonId: LessonId, file: string): Promise<string> {
    const filePath = sqlPath(lessonId, file);
    try {
        return await readFile(filePath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new NotFoundError(`No SQL file ${file} for ${lessonId}`, { lessonId, file });
        }
        throw error;
    }
}
