import Database from "better-sqlite3";
import { Connection } from "./database";
import {
  CODE_BY_WAVE_TYPE,
  GridRecord,
  ProfileRecord,
  WAVE_TYPE_BY_CODE,
  WaveType,
} from "../types";

export interface ProfileFilter {
  author: string;
  nfo: string;
}

export type BibrefChange = "inserted" | "updated" | "unchanged";

interface CountRow {
  count: number;
}

interface ProfileRow {
  depth: number;
  velocity: number;
  wave_type: string;
  nfo: string;
  author: string;
}

interface GridRow {
  longitude: number;
  latitude: number;
  depth: number;
  velocity: number;
  r: number | null;
  nfo: string;
  author: string;
}

interface NameRow {
  name: string;
}

interface BibrefRow {
  bibref: string;
}

interface GridStatements {
  count: Database.Statement<[string], CountRow>;
  list: Database.Statement<[string, number, number], GridRow>;
  exists: Database.Statement<
    [number, number, number, number, string, string],
    unknown
  >;
  insert: Database.Statement<
    [number, number, number, number, number | null, string, string],
    unknown
  >;
}

const GRID_TABLES: Record<WaveType, { table: string; column: string }> = {
  P: { table: "velocity_models_3d_vp", column: "vp" },
  S: { table: "velocity_models_3d_vs", column: "vs" },
};

const MODEL_TABLES = [
  "velocity_models_1d",
  GRID_TABLES.P.table,
  GRID_TABLES.S.table,
];

/**
 * Wraps a search term for a case-insensitive substring LIKE, with the
 * wildcard characters in the term matched literally.
 */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function toWaveType(code: string): WaveType {
  if (code === "VP" || code === "VS") return WAVE_TYPE_BY_CODE[code];
  throw new Error(`Unknown wave type in database: ${code}`);
}

function toProfileRecord(row: ProfileRow): ProfileRecord {
  return {
    depth: row.depth,
    velocity: row.velocity,
    waveType: toWaveType(row.wave_type),
    sourceLabel: row.nfo,
    referenceId: row.author,
  };
}

function toGridRecord(row: GridRow): GridRecord {
  return {
    longitude: row.longitude,
    latitude: row.latitude,
    depth: row.depth,
    velocity: row.velocity,
    scaleFactor: row.r,
    sourceLabel: row.nfo,
    referenceId: row.author,
  };
}

export class VelocityRepository {
  private readonly countProfilesStmt: Database.Statement<[string, string], CountRow>;
  private readonly listProfilesStmt: Database.Statement<
    [string, string, number, number],
    ProfileRow
  >;
  private readonly profileExistsStmt: Database.Statement<
    [number, number, string, string, string],
    unknown
  >;
  private readonly insertProfileStmt: Database.Statement<
    [number, number, string, string, string],
    unknown
  >;
  private readonly grid: Record<WaveType, GridStatements>;
  private readonly findBibrefStmt: Database.Statement<[string], BibrefRow>;
  private readonly exactBibrefStmt: Database.Statement<[string], BibrefRow>;
  private readonly insertBibrefStmt: Database.Statement<[string, string], unknown>;
  private readonly updateBibrefStmt: Database.Statement<[string, string], unknown>;
  private readonly authorsStmt: Database.Statement<[], NameRow>;
  private readonly nfosStmt: Database.Statement<[], NameRow>;

  constructor(private readonly db: Connection) {
    this.countProfilesStmt = db.prepare<[string, string], CountRow>(
      `SELECT COUNT(*) AS count FROM velocity_models_1d
       WHERE author LIKE ? ESCAPE '\\' AND nfo LIKE ? ESCAPE '\\'`,
    );
    this.listProfilesStmt = db.prepare<
      [string, string, number, number],
      ProfileRow
    >(
      `SELECT depth, velocity, wave_type, nfo, author FROM velocity_models_1d
       WHERE author LIKE ? ESCAPE '\\' AND nfo LIKE ? ESCAPE '\\'
       ORDER BY depth ASC, id ASC
       LIMIT ? OFFSET ?`,
    );
    this.profileExistsStmt = db.prepare<
      [number, number, string, string, string],
      unknown
    >(
      `SELECT 1 FROM velocity_models_1d
       WHERE depth = ? AND velocity = ? AND wave_type = ? AND nfo = ? AND author = ?
       LIMIT 1`,
    );
    this.insertProfileStmt = db.prepare<
      [number, number, string, string, string],
      unknown
    >(
      `INSERT INTO velocity_models_1d (depth, velocity, wave_type, nfo, author)
       VALUES (?, ?, ?, ?, ?)`,
    );

    this.grid = {
      P: this.prepareGrid("P"),
      S: this.prepareGrid("S"),
    };

    this.findBibrefStmt = db.prepare<[string], BibrefRow>(
      `SELECT bibref FROM author_bibrefs
       WHERE author LIKE ? ESCAPE '\\'
       ORDER BY id ASC
       LIMIT 1`,
    );
    this.exactBibrefStmt = db.prepare<[string], BibrefRow>(
      "SELECT bibref FROM author_bibrefs WHERE author = ?",
    );
    this.insertBibrefStmt = db.prepare<[string, string], unknown>(
      "INSERT INTO author_bibrefs (author, bibref) VALUES (?, ?)",
    );
    this.updateBibrefStmt = db.prepare<[string, string], unknown>(
      "UPDATE author_bibrefs SET bibref = ? WHERE author = ?",
    );

    this.authorsStmt = db.prepare<[], NameRow>(this.distinctAcrossModels("author"));
    this.nfosStmt = db.prepare<[], NameRow>(this.distinctAcrossModels("nfo"));
  }

  private prepareGrid(waveType: WaveType): GridStatements {
    const { table, column } = GRID_TABLES[waveType];
    return {
      count: this.db.prepare<[string], CountRow>(
        `SELECT COUNT(*) AS count FROM ${table} WHERE author LIKE ? ESCAPE '\\'`,
      ),
      list: this.db.prepare<[string, number, number], GridRow>(
        `SELECT longitude, latitude, depth, ${column} AS velocity, r, nfo, author
         FROM ${table}
         WHERE author LIKE ? ESCAPE '\\'
         ORDER BY longitude ASC, latitude ASC, depth ASC, id ASC
         LIMIT ? OFFSET ?`,
      ),
      exists: this.db.prepare<
        [number, number, number, number, string, string],
        unknown
      >(
        `SELECT 1 FROM ${table}
         WHERE longitude = ? AND latitude = ? AND depth = ? AND ${column} = ?
           AND nfo = ? AND author = ?
         LIMIT 1`,
      ),
      insert: this.db.prepare<
        [number, number, number, number, number | null, string, string],
        unknown
      >(
        `INSERT INTO ${table} (longitude, latitude, depth, ${column}, r, nfo, author)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      ),
    };
  }

  private distinctAcrossModels(column: "author" | "nfo"): string {
    const selects = MODEL_TABLES.map(
      (table) =>
        `SELECT ${column} AS name FROM ${table} WHERE ${column} IS NOT NULL AND ${column} <> ''`,
    );
    return `${selects.join(" UNION ")} ORDER BY name`;
  }

  countProfiles(filter: ProfileFilter): number {
    const row = this.countProfilesStmt.get(
      containsPattern(filter.author),
      containsPattern(filter.nfo),
    );
    return row?.count ?? 0;
  }

  listProfiles(
    filter: ProfileFilter,
    offset: number,
    limit: number,
  ): ProfileRecord[] {
    return this.listProfilesStmt
      .all(
        containsPattern(filter.author),
        containsPattern(filter.nfo),
        limit,
        offset,
      )
      .map(toProfileRecord);
  }

  countGrid(waveType: WaveType, author: string): number {
    const row = this.grid[waveType].count.get(containsPattern(author));
    return row?.count ?? 0;
  }

  listGrid(
    waveType: WaveType,
    author: string,
    offset: number,
    limit: number,
  ): GridRecord[] {
    return this.grid[waveType].list
      .all(containsPattern(author), limit, offset)
      .map(toGridRecord);
  }

  /**
   * Bibliographic reference of the first author containing `author`, or ""
   * when there is none.
   */
  findBibref(author: string): string {
    return this.findBibrefStmt.get(containsPattern(author))?.bibref ?? "";
  }

  listAuthors(): string[] {
    return this.authorsStmt.all().map((row) => row.name);
  }

  listNfos(): string[] {
    return this.nfosStmt.all().map((row) => row.name);
  }

  profileExists(record: ProfileRecord): boolean {
    return (
      this.profileExistsStmt.get(
        record.depth,
        record.velocity,
        CODE_BY_WAVE_TYPE[record.waveType],
        record.sourceLabel,
        record.referenceId,
      ) !== undefined
    );
  }

  insertProfile(record: ProfileRecord): void {
    this.insertProfileStmt.run(
      record.depth,
      record.velocity,
      CODE_BY_WAVE_TYPE[record.waveType],
      record.sourceLabel,
      record.referenceId,
    );
  }

  // The scale factor takes no part in duplicate detection
  gridPointExists(waveType: WaveType, record: GridRecord): boolean {
    return (
      this.grid[waveType].exists.get(
        record.longitude,
        record.latitude,
        record.depth,
        record.velocity,
        record.sourceLabel,
        record.referenceId,
      ) !== undefined
    );
  }

  insertGridPoint(waveType: WaveType, record: GridRecord): void {
    this.grid[waveType].insert.run(
      record.longitude,
      record.latitude,
      record.depth,
      record.velocity,
      record.scaleFactor,
      record.sourceLabel,
      record.referenceId,
    );
  }

  upsertBibref(author: string, bibref: string): BibrefChange {
    const existing = this.exactBibrefStmt.get(author);
    if (!existing) {
      this.insertBibrefStmt.run(author, bibref);
      return "inserted";
    }
    if (existing.bibref === bibref) return "unchanged";

    this.updateBibrefStmt.run(bibref, author);
    return "updated";
  }

  /**
   * Runs `fn` in a transaction; anything it throws rolls the whole unit back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}
