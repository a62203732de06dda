/**
 * Tract Lookup Error Types
 *
 * Build-time errors (missing file, schema, decode) abort a catalog load and
 * leave the previously published catalog serving. Query-time errors are
 * surfaced per point in batch mode.
 *
 * GeometryEvaluationError is the one error the containment resolver recovers
 * from locally: the offending candidate is skipped.
 */

export type LookupErrorCode =
  | 'MISSING_FILE'
  | 'SCHEMA_ERROR'
  | 'DECODE_ERROR'
  | 'UNSUPPORTED_GEOMETRY'
  | 'NOT_READY'
  | 'INVALID_POINT'
  | 'GEOMETRY_EVALUATION';

/**
 * Base class for every error raised by the lookup engine
 */
export abstract class LookupError extends Error {
  abstract readonly code: LookupErrorCode;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export type ArtifactKind = 'geometry' | 'scores';

/**
 * A source artifact is absent at its configured path
 */
export class MissingFileError extends LookupError {
  public readonly name = 'MissingFileError' as const;
  public readonly code = 'MISSING_FILE' as const;

  constructor(
    public readonly artifact: ArtifactKind,
    public readonly path: string
  ) {
    super(`${artifact === 'geometry' ? 'Geometry table' : 'Scores file'} missing: ${path}`);
    Object.setPrototypeOf(this, MissingFileError.prototype);
  }
}

/**
 * An artifact exists but lacks required tables, columns or fields
 */
export class SchemaError extends LookupError {
  public readonly name = 'SchemaError' as const;
  public readonly code = 'SCHEMA_ERROR' as const;

  constructor(
    message: string,
    public readonly artifact: ArtifactKind
  ) {
    super(message);
    Object.setPrototypeOf(this, SchemaError.prototype);
  }
}

/**
 * Location of a bad record within the polygon table
 */
export interface RecordContext {
  readonly row: number;
  readonly regionId?: string;
}

/**
 * Malformed binary geometry
 */
export class DecodeError extends LookupError {
  public readonly name = 'DecodeError' as const;
  public readonly code = 'DECODE_ERROR' as const;

  constructor(
    message: string,
    public readonly record?: RecordContext
  ) {
    super(record ? `${message} (row ${record.row}${record.regionId ? `, ${record.regionId}` : ''})` : message);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }

  withRecord(record: RecordContext): DecodeError {
    return new DecodeError(this.message, record);
  }
}

/**
 * Well-formed geometry of a kind that cannot enclose a point
 */
export class UnsupportedGeometryError extends LookupError {
  public readonly name = 'UnsupportedGeometryError' as const;
  public readonly code = 'UNSUPPORTED_GEOMETRY' as const;

  constructor(
    public readonly geometryType: string,
    public readonly record?: RecordContext
  ) {
    super(
      `Unsupported geometry type ${geometryType}; only Polygon and MultiPolygon can be located` +
        (record ? ` (row ${record.row}${record.regionId ? `, ${record.regionId}` : ''})` : '')
    );
    Object.setPrototypeOf(this, UnsupportedGeometryError.prototype);
  }

  withRecord(record: RecordContext): UnsupportedGeometryError {
    return new UnsupportedGeometryError(this.geometryType, record);
  }
}

/**
 * Query issued before any catalog has been published
 */
export class NotReadyError extends LookupError {
  public readonly name = 'NotReadyError' as const;
  public readonly code = 'NOT_READY' as const;

  constructor(message = 'Index not loaded yet. Upload file(s) and call /v1/reload.') {
    super(message);
    Object.setPrototypeOf(this, NotReadyError.prototype);
  }
}

/**
 * Query coordinates are not finite numbers
 */
export class InvalidPointError extends LookupError {
  public readonly name = 'InvalidPointError' as const;
  public readonly code = 'INVALID_POINT' as const;

  constructor(
    public readonly lat: number,
    public readonly lon: number
  ) {
    super(`Invalid point: lat=${lat}, lon=${lon}`);
    Object.setPrototypeOf(this, InvalidPointError.prototype);
  }
}

/**
 * A candidate polygon cannot be evaluated (non-finite coordinates,
 * self-intersecting ring)
 */
export class GeometryEvaluationError extends LookupError {
  public readonly name = 'GeometryEvaluationError' as const;
  public readonly code = 'GEOMETRY_EVALUATION' as const;

  constructor(public readonly issues: readonly string[]) {
    super(`Geometry cannot be evaluated: ${issues.join('; ')}`);
    Object.setPrototypeOf(this, GeometryEvaluationError.prototype);
  }
}

/**
 * Type guard for errors raised by the lookup engine
 */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}

/**
 * Normalize an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
