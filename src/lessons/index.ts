export { getLesson, listLessons, lessonLabel } from './registry.js';
export { loadSql, sqlPath, SQL_ROOT } from './sql.js';
export {
    SridService,
    DEMO_POINTS,
    parseCoordinate,
    parsePointId,
    parseSridSelection
} from './day5/srid.js';
export type {
    SridSelection,
    SridTable,
    AddedPoint,
    ListedPoint,
    PointListing,
    TransformedPoint,
    SridDemoReport
} from './day5/srid.js';
export {
    formatAdded,
    formatTransform,
    listingTable,
    listingTitle,
    printListings,
    printSridDemo
} from './day5/format.js';
