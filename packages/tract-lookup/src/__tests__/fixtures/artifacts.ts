/**
 * On-disk catalog artifacts for tests
 *
 * Writes a SQLite polygon table and a JSON score table into a fresh
 * temporary directory.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { SourcesConfig } from '../../core/config.js';

export interface RegionRow {
  readonly id: string | null;
  readonly wkb: Uint8Array | string | null;
}

export interface ArtifactDir {
  readonly dir: string;
  readonly geometryPath: string;
  readonly scoresPath: string;
  readonly sources: SourcesConfig;
  writeRegions(rows: readonly RegionRow[], table?: string): void;
  writeScores(scores: Readonly<Record<string, number | null>>): void;
  writeScoresText(text: string): void;
  cleanup(): void;
}

export function createArtifactDir(): ArtifactDir {
  const dir = mkdtempSync(join(tmpdir(), 'tract-lookup-'));
  const geometryPath = join(dir, 'tracts.sqlite');
  const scoresPath = join(dir, 'scores.json');

  return {
    dir,
    geometryPath,
    scoresPath,
    sources: {
      geometryPath,
      table: 'tracts',
      idColumn: 'GEOID',
      geometryColumn: 'wkb',
      scoresPath,
    },

    writeRegions(rows, table = 'tracts') {
      rmSync(geometryPath, { force: true });
      const db = new Database(geometryPath);
      try {
        db.exec(`CREATE TABLE "${table}" (GEOID TEXT, wkb BLOB)`);
        const insert = db.prepare(`INSERT INTO "${table}" (GEOID, wkb) VALUES (?, ?)`);
        for (const row of rows) {
          const wkb = row.wkb instanceof Uint8Array ? Buffer.from(row.wkb) : row.wkb;
          insert.run(row.id, wkb);
        }
      } finally {
        db.close();
      }
    },

    writeScores(scores) {
      writeFileSync(scoresPath, JSON.stringify(scores));
    },

    writeScoresText(text) {
      writeFileSync(scoresPath, text);
    },

    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
