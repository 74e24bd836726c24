/**
 * postgis-lab - Dashboard request bodies
 *
 * Every field is optional; handlers fill in the lesson's defaults.
 */

import { z } from 'zod';

const Coordinate = z.union([z.number(), z.string()]).optional();

/** A named point, as posted by the add-location and add-place actions */
export const PointBodySchema = z.object({
    name: z.string().optional(),
    lon: Coordinate,
    lat: Coordinate
}).default({});

export const WorkMemBodySchema = z.object({
    value: z.string().optional()
}).default({});
