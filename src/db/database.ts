import Database from "better-sqlite3";
import { logger } from "../utils/logger";

export type Connection = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS velocity_models_1d (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  depth REAL NOT NULL,
  velocity REAL NOT NULL,
  wave_type TEXT NOT NULL CHECK (wave_type IN ('VP', 'VS')),
  nfo TEXT NOT NULL,
  author TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_velocity_models_1d_depth ON velocity_models_1d (depth);
CREATE INDEX IF NOT EXISTS ix_velocity_models_1d_wave_type ON velocity_models_1d (wave_type);
CREATE INDEX IF NOT EXISTS ix_velocity_models_1d_nfo ON velocity_models_1d (nfo);
CREATE INDEX IF NOT EXISTS ix_velocity_models_1d_author ON velocity_models_1d (author);

CREATE TABLE IF NOT EXISTS velocity_models_3d_vp (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  longitude REAL NOT NULL,
  latitude REAL NOT NULL,
  depth REAL NOT NULL,
  vp REAL NOT NULL,
  r REAL,
  nfo TEXT NOT NULL,
  author TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vp_position
  ON velocity_models_3d_vp (longitude, latitude, depth);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vp_nfo ON velocity_models_3d_vp (nfo);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vp_author ON velocity_models_3d_vp (author);

CREATE TABLE IF NOT EXISTS velocity_models_3d_vs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  longitude REAL NOT NULL,
  latitude REAL NOT NULL,
  depth REAL NOT NULL,
  vs REAL NOT NULL,
  r REAL,
  nfo TEXT NOT NULL,
  author TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vs_position
  ON velocity_models_3d_vs (longitude, latitude, depth);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vs_nfo ON velocity_models_3d_vs (nfo);
CREATE INDEX IF NOT EXISTS ix_velocity_models_3d_vs_author ON velocity_models_3d_vs (author);

CREATE TABLE IF NOT EXISTS author_bibrefs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  author TEXT NOT NULL UNIQUE,
  bibref TEXT NOT NULL
);
`;

export const IN_MEMORY = ":memory:";

/**
 * Opens (or creates) the model database and makes sure every table exists.
 */
export function openDatabase(filename: string): Connection {
  const db = new Database(filename);

  if (filename !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.exec(SCHEMA);

  logger.debug(`Opened database ${filename}`);
  return db;
}
