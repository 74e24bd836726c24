/**
 * postgis-lab - Day 1 dashboard routes
 *
 * Locations and the spherical distances between them.
 */

import type { QueryExecutor, RouteContext, RouteDefinition } from '../../types/index.js';
import { coordinateOr, textOr, toFloat, toInt } from '../../utils/coerce.js';
import { PointBodySchema } from '../schemas.js';

const SF = 'San Francisco Ferry Building';
const NY = 'New York Times Square';
const LONDON = 'London Big Ben';
const PARIS = 'Eiffel Tower, Paris';

const DEFAULT_LOCATION = { name: 'Tokyo Tower', lon: 139.7454, lat: 35.6586 };

function geographyDistanceSql(from: string, to: string): string {
    return `SELECT ST_Distance(
        (SELECT geog_global FROM locations WHERE name = '${from}'),
        (SELECT geog_global FROM locations WHERE name = '${to}')
    ) AS meters`;
}

async function distance(executor: QueryExecutor, from: string, to: string): Promise<number | null> {
    const result = await executor.execute(geographyDistanceSql(from, to));
    return toFloat(result.rows[0]?.['meters']);
}

export function createDay1Routes({ executor }: RouteContext): RouteDefinition[] {
    return [
        {
            method: 'GET',
            path: '/locations',
            description: 'Locations with lon/lat, ordered by id',
            handler: async () => {
                const result = await executor.execute(
                    'SELECT id, name, ST_X(geom_global) AS lon, ST_Y(geom_global) AS lat FROM locations ORDER BY id'
                );
                return result.rows.map((row) => ({
                    id: toInt(row['id']),
                    name: String(row['name']),
                    lon: toFloat(row['lon']),
                    lat: toFloat(row['lat'])
                }));
            }
        },
        {
            method: 'GET',
            path: '/distances',
            description: 'Spherical SF-NY and London-Paris distances',
            handler: async () => {
                const result = await executor.execute(`
                    SELECT 'SF to NY (Spherical)' AS label,
                           ST_Distance(
                             (SELECT geog_global FROM locations WHERE name = '${SF}'),
                             (SELECT geog_global FROM locations WHERE name = '${NY}')
                           ) AS meters
                    UNION ALL
                    SELECT 'London to Paris (Spherical)',
                           ST_Distance(
                             (SELECT geog_global FROM locations WHERE name = '${LONDON}'),
                             (SELECT geog_global FROM locations WHERE name = '${PARIS}')
                           )
                `);
                return result.rows.map((row) => ({
                    label: String(row['label']),
                    meters: toFloat(row['meters'])
                }));
            }
        },
        {
            method: 'GET',
            path: '/stats',
            description: 'Location count and headline distances',
            handler: async () => {
                const count = await executor.execute('SELECT COUNT(*) AS total FROM locations');
                return {
                    totalLocations: toInt(count.rows[0]?.['total']),
                    sfNyMeters: await distance(executor, SF, NY),
                    londonParisMeters: await distance(executor, LONDON, PARIS)
                };
            }
        },
        {
            method: 'POST',
            path: '/refresh',
            description: 'Ask the page to refetch',
            handler: async () => ({ ok: true, message: 'Use GET /api/stats and /api/locations to refresh.' })
        },
        {
            method: 'POST',
            path: '/add-location',
            description: 'Insert a location (defaults to Tokyo Tower)',
            handler: async (body) => {
                const input = PointBodySchema.parse(body);
                const name = textOr(input.name, DEFAULT_LOCATION.name);
                const lon = coordinateOr(input.lon, DEFAULT_LOCATION.lon);
                const lat = coordinateOr(input.lat, DEFAULT_LOCATION.lat);
                await executor.execute(
                    `INSERT INTO locations (name, geom_local, geom_global, geog_global)
                     VALUES ($1,
                       ST_Transform(ST_SetSRID(ST_MakePoint($2, $3), 4326), 3857),
                       ST_SetSRID(ST_MakePoint($2, $3), 4326),
                       ST_SetSRID(ST_MakePoint($2, $3), 4326)::GEOGRAPHY)`,
                    [name, lon, lat]
                );
                return { ok: true, message: `Added location: ${name}` };
            }
        },
        {
            method: 'POST',
            path: '/reset-locations',
            description: 'Drop added locations and rewind the id sequence',
            handler: async () => {
                await executor.transaction(async (tx) => {
                    await tx.execute('DELETE FROM locations WHERE id > 4');
                    await tx.execute("SELECT setval(pg_get_serial_sequence('locations', 'id'), 4)");
                });
                return { ok: true, message: 'Reset to original 4 locations.' };
            }
        }
    ];
}
