/**
 * postgis-lab - SRID 4326 vs 3857 tool
 *
 * Every point is stored twice: as WGS84 lon/lat in locations_4326 and,
 * through ST_Transform, as Web Mercator metres in locations_3857.
 */

import { z } from 'zod';
import type { QueryExecutor } from '../../types/index.js';
import { NotFoundError, ValidationError } from '../../types/index.js';
import { toFloat, toInt } from '../../utils/coerce.js';
import { logger } from '../../utils/logger.js';

const log = logger.forModule('SRID');

export const SridSelectionSchema = z.enum(['4326', '3857', 'all']);

export type SridSelection = z.infer<typeof SridSelectionSchema>;
export type SridTable = Exclude<SridSelection, 'all'>;

export interface AddedPoint {
    name: string;
    id4326: number;
    id3857: number;
}

export interface ListedPoint {
    id: number;
    name: string;
    geometry: string;
}

export interface PointListing {
    srid: SridTable;
    rows: ListedPoint[];
}

export interface TransformedPoint {
    id: number;
    name: string;
    geom4326Text: string;
    lon: number;
    lat: number;
    geom3857Text: string;
    x: number;
    y: number;
}

export interface SridDemoReport {
    added: AddedPoint[];
    listings: PointListing[];
    transformed: TransformedPoint;
}

export const DEMO_POINTS: readonly { name: string; lon: number; lat: number }[] = [
    { name: 'Eiffel Tower', lon: 2.2945, lat: 48.8584 },
    { name: 'Statue of Liberty', lon: -74.0445, lat: 40.6892 },
    { name: 'Sydney Opera House', lon: 151.2153, lat: -33.8568 }
];

function createTableSql(srid: SridTable): string {
    return `CREATE TABLE locations_${srid} (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100),
        geom GEOMETRY(Point, ${srid}),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )`;
}

function returnedId(rows: readonly Record<string, unknown>[]): number {
    return toInt(rows[0]?.['id']);
}

export class SridService {
    constructor(private readonly executor: QueryExecutor) { }

    /**
     * Ensure PostGIS, then drop and recreate both tables
     */
    async initDb(): Promise<void> {
        await this.executor.transaction(async (tx) => {
            await tx.execute('CREATE EXTENSION IF NOT EXISTS postgis');
            for (const srid of ['4326', '3857'] as const) {
                await tx.execute(`DROP TABLE IF EXISTS locations_${srid}`);
                await tx.execute(createTableSql(srid));
            }
        });
        log.info('Created locations_4326 and locations_3857');
    }

    async addPoint(name: string, lon: number, lat: number): Promise<AddedPoint> {
        const added = await this.executor.transaction(async (tx) => {
            const in4326 = await tx.execute(
                'INSERT INTO locations_4326 (name, geom) VALUES ($1, ST_SetSRID(ST_MakePoint($2, $3), 4326)) RETURNING id',
                [name, lon, lat]
            );
            const in3857 = await tx.execute(
                `INSERT INTO locations_3857 (name, geom)
                 SELECT $1, ST_Transform(ST_SetSRID(ST_MakePoint($2, $3), 4326), 3857) RETURNING id`,
                [name, lon, lat]
            );
            return { name, id4326: returnedId(in4326.rows), id3857: returnedId(in3857.rows) };
        });
        log.debug(`Added ${name}`, { ...added });
        return added;
    }

    async listPoints(selection: SridSelection = 'all'): Promise<PointListing[]> {
        const tables: SridTable[] = selection === 'all' ? ['4326', '3857'] : [selection];
        const listings: PointListing[] = [];
        for (const srid of tables) {
            const result = await this.executor.execute(
                `SELECT id, name, ST_AsText(geom) AS geometry FROM locations_${srid} ORDER BY id`
            );
            listings.push({
                srid,
                rows: result.rows.map((row) => ({
                    id: toInt(row['id']),
                    name: String(row['name']),
                    geometry: String(row['geometry'])
                }))
            });
        }
        return listings;
    }

    /**
     * Read a 4326 point and project it to 3857 on the fly
     */
    async transformPoint(id: number): Promise<TransformedPoint> {
        const result = await this.executor.execute(
            `SELECT
                name,
                ST_AsText(geom) AS geom_4326_text,
                ST_X(geom) AS lon,
                ST_Y(geom) AS lat,
                ST_AsText(ST_Transform(geom, 3857)) AS geom_3857_text,
                ST_X(ST_Transform(geom, 3857)) AS x_3857,
                ST_Y(ST_Transform(geom, 3857)) AS y_3857
             FROM locations_4326
             WHERE id = $1`,
            [id]
        );
        const row = result.rows[0];
        if (!row) {
            throw new NotFoundError(`Point with ID ${String(id)} not found in locations_4326.`, { id });
        }
        return {
            id,
            name: String(row['name']),
            geom4326Text: String(row['geom_4326_text']),
            lon: toFloat(row['lon']) ?? 0,
            lat: toFloat(row['lat']) ?? 0,
            geom3857Text: String(row['geom_3857_text']),
            x: toFloat(row['x_3857']) ?? 0,
            y: toFloat(row['y_3857']) ?? 0
        };
    }

    async runDemo(): Promise<SridDemoReport> {
        await this.initDb();
        const added: AddedPoint[] = [];
        for (const point of DEMO_POINTS) {
            added.push(await this.addPoint(point.name, point.lon, point.lat));
        }
        const listings = await this.listPoints('all');
        const transformed = await this.transformPoint(1);
        return { added, listings, transformed };
    }
}

/**
 * Longitude or latitude typed on the command line
 */
export function parseCoordinate(text: string): number {
    const value = Number(text);
    if (text.trim() === '' || !Number.isFinite(value)) {
        throw new ValidationError('Longitude and Latitude must be numbers.', { value: text });
    }
    return value;
}

export function parsePointId(text: string): number {
    if (!/^-?\d+$/.test(text.trim())) {
        throw new ValidationError('Point ID must be an integer.', { value: text });
    }
    return parseInt(text, 10);
}

export function parseSridSelection(text: string | undefined): SridSelection {
    const parsed = SridSelectionSchema.safeParse((text ?? 'all').toLowerCase());
    if (!parsed.success) {
        throw new ValidationError(`Unknown SRID '${text ?? ''}'; use 4326, 3857 or all.`, { value: text });
    }
    return parsed.data;
}
