/**
 * Catalog Sources
 *
 * Reads the two artifacts a catalog is built from:
 * - Polygon table: SQLite database, one row per region, identifier + WKB columns
 * - Score table: JSON object mapping region identifier → number | null
 *
 * Both readers enforce the schema contract and nothing more; geometry is
 * decoded by the catalog builder.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { DecodeError, MissingFileError, SchemaError } from '../core/errors.js';
import type { PolygonRecord, Score } from '../core/types.js';

export interface PolygonTableSource {
  readonly path: string;
  readonly table: string;
  readonly idColumn: string;
  readonly geometryColumn: string;
}

interface ColumnInfo {
  readonly name: string;
  /** 1-based position in the primary key, 0 when not part of it */
  readonly pk: number;
}

const columnInfoSchema = z.object({ name: z.string(), pk: z.number() });

/** PRAGMA table_list row: object type and WITHOUT ROWID flag */
const tableListSchema = z.object({ type: z.string(), wr: z.number() });

/**
 * JSON score table: flat object, numeric or null values
 */
const scoreTableSchema = z.record(z.string(), z.number().finite().nullable());

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check that both artifacts exist
 */
export function artifactsExist(geometryPath: string, scoresPath: string): {
  readonly geometry: boolean;
  readonly scores: boolean;
} {
  return { geometry: existsSync(geometryPath), scores: existsSync(scoresPath) };
}

/**
 * Read all polygon table rows in storage order
 *
 * Ordinary tables are read in rowid order; WITHOUT ROWID tables in primary
 * key order; views in the order the view yields.
 *
 * @throws MissingFileError if the database file is absent
 * @throws SchemaError if the file is not a readable database, the table or a
 * required column is absent, or an identifier is NULL
 * @throws DecodeError if a geometry cell is NULL or not binary/hex
 */
export function readPolygonTable(source: PolygonTableSource): PolygonRecord[] {
  if (!existsSync(source.path)) {
    throw new MissingFileError('geometry', source.path);
  }

  for (const name of [source.table, source.idColumn, source.geometryColumn]) {
    if (!IDENTIFIER_PATTERN.test(name)) {
      throw new SchemaError(`Invalid table or column name: ${name}`, 'geometry');
    }
  }

  try {
    return readRows(source);
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      throw new SchemaError(
        `Cannot read polygon table from ${source.path}: ${error.message} (${error.code})`,
        'geometry'
      );
    }
    throw error;
  }
}

function readRows(source: PolygonTableSource): PolygonRecord[] {
  const db = new Database(source.path, { readonly: true, fileMustExist: true });

  try {
    const columns = db
      .prepare(`PRAGMA table_info(${source.table})`)
      .all()
      .map((row): ColumnInfo => columnInfoSchema.parse(row));

    if (columns.length === 0) {
      throw new SchemaError(`Polygon table ${source.table} not found in ${source.path}`, 'geometry');
    }

    const names = new Set(columns.map((c) => c.name));
    const missing = [source.idColumn, source.geometryColumn].filter((c) => !names.has(c));
    if (missing.length > 0) {
      throw new SchemaError(
        `Polygon table must contain columns: ${source.idColumn}, ${source.geometryColumn} (missing ${missing.join(', ')})`,
        'geometry'
      );
    }

    const orderBy = rowOrder(db, source.table, columns);
    const rows = db
      .prepare(
        `SELECT "${source.idColumn}" AS region_id, "${source.geometryColumn}" AS geometry FROM "${source.table}"` +
          (orderBy ? ` ORDER BY ${orderBy}` : '')
      )
      .raw()
      .all();

    return rows.map((row, position) => toPolygonRecord(row, position));
  } finally {
    db.close();
  }
}

/**
 * ORDER BY clause that fixes row positions, or null for a view
 */
function rowOrder(db: Database.Database, table: string, columns: readonly ColumnInfo[]): string | null {
  const listed = tableListSchema.safeParse(db.prepare(`PRAGMA table_list(${table})`).get());
  const kind = listed.success ? listed.data : { type: 'table', wr: 0 };

  if (kind.type === 'table' && kind.wr === 0) {
    return 'rowid';
  }

  const primaryKey = columns
    .filter((c) => c.pk > 0)
    .sort((a, b) => a.pk - b.pk)
    .map((c) => `"${c.name}"`);
  return primaryKey.length > 0 ? primaryKey.join(', ') : null;
}

function toPolygonRecord(row: unknown, position: number): PolygonRecord {
  if (!Array.isArray(row) || row.length !== 2) {
    throw new SchemaError(`Unexpected row shape at row ${position}`, 'geometry');
  }
  const [rawId, rawGeometry]: unknown[] = row;

  if (rawId === null || rawId === undefined) {
    throw new SchemaError(`Row ${position} has no region identifier`, 'geometry');
  }
  const regionId = String(rawId);

  if (rawGeometry instanceof Uint8Array || typeof rawGeometry === 'string') {
    return { regionId, geometry: rawGeometry };
  }

  throw new DecodeError(
    rawGeometry === null ? 'Geometry is NULL' : `Geometry cell has type ${typeof rawGeometry}, expected BLOB`,
    { row: position, regionId }
  );
}

/**
 * Read the score table
 *
 * @throws MissingFileError if the file is absent
 * @throws SchemaError if the file is not a JSON object of numbers/nulls
 */
export async function readScoreTable(path: string): Promise<Map<string, Score>> {
  if (!existsSync(path)) {
    throw new MissingFileError('scores', path);
  }

  const text = await readFile(path, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SchemaError(
      `Scores file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'scores'
    );
  }

  const parsed = scoreTableSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new SchemaError(
      `Scores file must map identifiers to numbers or null${where}: ${issue?.message ?? 'invalid'}`,
      'scores'
    );
  }

  return new Map(Object.entries(parsed.data));
}
