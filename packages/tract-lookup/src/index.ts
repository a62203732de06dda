/**
 * Tract Lookup
 *
 * Point-in-polygon score lookup over a catalog of census-tract-like regions.
 *
 * @example
 * ```typescript
 * import { TractLookupService, configFromEnv } from '@tract-score/tract-lookup';
 *
 * const config = configFromEnv();
 * const service = new TractLookupService({ sources: config.sources });
 * await service.load();
 * service.locate(37.77, -122.42); // { regionId: '06075...', score: 0.42 }
 * ```
 */

// Core
export type {
  AreaGeometry,
  BBox,
  Position,
  QueryPoint,
  PolygonRecord,
  RegionPolygon,
  Score,
  ScoreTable,
} from './core/types.js';
export { toPosition, isFinitePoint } from './core/types.js';
export { extractBBox, isPositionInBBox, toRegionPolygon } from './core/geo-utils.js';

export {
  LookupError,
  MissingFileError,
  SchemaError,
  DecodeError,
  UnsupportedGeometryError,
  NotReadyError,
  InvalidPointError,
  GeometryEvaluationError,
  isLookupError,
  errorMessage,
} from './core/errors.js';
export type { LookupErrorCode, ArtifactKind, RecordContext } from './core/errors.js';

export { DEFAULT_CONFIG, createConfig, configFromEnv } from './core/config.js';
export type {
  LookupConfig,
  SourcesConfig,
  ContainmentConfig,
  ServerConfig,
  DeepPartial,
} from './core/config.js';

export { Logger, logger, createLogger, getLogLevel } from './core/utils/logger.js';
export type { LogLevel, LogMetadata, LoggerOptions } from './core/utils/logger.js';

// Services
export { decodeWkb, decodeRegionPolygon } from './services/wkb-decoder.js';
export { SpatialIndex } from './services/spatial-index.js';
export { ContainmentResolver } from './services/containment-resolver.js';
export type { ContainmentResolverOptions } from './services/containment-resolver.js';
export { RegionCatalog, buildCatalog } from './services/region-catalog.js';
export type { CatalogMetadata, CatalogMatch, CatalogSummary } from './services/region-catalog.js';
export { artifactsExist, readPolygonTable, readScoreTable } from './services/catalog-sources.js';
export type { PolygonTableSource } from './services/catalog-sources.js';

// Serving
export * from './serving/index.js';
