/**
 * postgis-lab - SRID tool output
 */

import type { Output } from '../../utils/output.js';
import type { AddedPoint, PointListing, SridDemoReport, SridTable, TransformedPoint } from './srid.js';

const LISTING_TITLES: Record<SridTable, string> = {
    '4326': 'Locations (SRID 4326 - WGS84 Lat/Lon):',
    '3857': 'Locations (SRID 3857 - Web Mercator X/Y):'
};

export function listingTitle(srid: SridTable): string {
    return LISTING_TITLES[srid];
}

/**
 * Rows keyed by column header, ready for console.table
 */
export function listingTable(listing: PointListing): Record<string, string | number>[] {
    const geometryHeader = `Geometry (${listing.srid})`;
    return listing.rows.map((row) => ({
        ID: row.id,
        Name: row.name,
        [geometryHeader]: row.geometry
    }));
}

export function formatAdded(point: AddedPoint): string[] {
    return [
        `  Added to locations_4326 (ID: ${String(point.id4326)})`,
        `  Transformed and added to locations_3857 (ID: ${String(point.id3857)})`
    ];
}

export function formatTransform(point: TransformedPoint): string[] {
    return [
        `  Name: ${point.name}`,
        '  SRID 4326 (WGS84):',
        `    Geometry: ${point.geom4326Text}`,
        `    Longitude (X): ${point.lon.toFixed(6)}, Latitude (Y): ${point.lat.toFixed(6)}`,
        '  SRID 3857 (Web Mercator):',
        `    Geometry: ${point.geom3857Text}`,
        `    X: ${point.x.toFixed(2)}, Y: ${point.y.toFixed(2)}`
    ];
}

export function printListings(listings: readonly PointListing[], output: Output): void {
    listings.forEach((listing, index) => {
        output.line(index === 0 ? listingTitle(listing.srid) : `\n${listingTitle(listing.srid)}`);
        output.table(listingTable(listing));
    });
}

export function printSridDemo(report: SridDemoReport, output: Output): void {
    const rule = '='.repeat(50);
    output.line(`\n${rule}\n  SRID 4326 vs 3857 Demonstration\n${rule}`);
    for (const point of report.added) {
        output.line(`\n--- Adding Point: ${point.name} ---`);
        formatAdded(point).forEach((line) => output.line(line));
    }
    output.line('\n--- Listing Points (ALL) ---');
    printListings(report.listings, output);
    output.line(`\n--- Transforming and Displaying Point (ID: ${String(report.transformed.id)}) ---`);
    formatTransform(report.transformed).forEach((line) => output.line(line));
    output.line(`\n${rule}\n  Demonstration Complete.\n${rule}`);
}
