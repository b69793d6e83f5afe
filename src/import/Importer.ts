import { VelocityRepository } from "../db/VelocityRepository";
import { InvalidRowError } from "../errors";
import {
  CODE_BY_WAVE_TYPE,
  GridRecord,
  ImportKind,
  ImportSummary,
  ProfileRecord,
  WAVE_TYPE_BY_CODE,
  WaveType,
} from "../types";
import { logger } from "../utils/logger";
import {
  CsvRow,
  readCsvFile,
  readNumber,
  readText,
  requireColumns,
} from "./csvReader";

export const PROFILE_COLUMNS = [
  "Depth (km)",
  "Velocity (km/s)",
  "Type",
  "NFO",
  "Author",
];
export const BIBREF_COLUMNS = ["Author", "Bibref"];
export const SCALE_FACTOR_COLUMN = "R";

export function velocityColumn(waveType: WaveType): string {
  return waveType === "P" ? "Vp" : "Vs";
}

export function gridColumns(waveType: WaveType): string[] {
  return [
    "Longitude",
    "Latitude",
    "Depth",
    velocityColumn(waveType),
    "NFO",
    "Author",
  ];
}

function readWaveType(row: CsvRow): WaveType {
  const code = readText(row, "Type").toUpperCase();
  if (code === "VP" || code === "VS") return WAVE_TYPE_BY_CODE[code];
  throw new InvalidRowError(
    row.line,
    "Type",
    code,
    `Row ${row.line}: column 'Type' must be VP or VS ('${code}')`,
  );
}

function readScaleFactor(row: CsvRow, hasColumn: boolean): number {
  if (!hasColumn || readText(row, SCALE_FACTOR_COLUMN) === "") return 1.0;
  return readNumber(row, SCALE_FACTOR_COLUMN);
}

function emptySummary(): ImportSummary {
  return { imported: 0, skipped: 0, updated: 0 };
}

/**
 * Loads CSV files into the repository. Every file is one transaction, so a
 * bad row leaves the database as it was before the import started.
 */
export class Importer {
  constructor(private readonly repository: VelocityRepository) {}

  importFile(
    kind: ImportKind,
    filePath: string,
    waveType?: WaveType,
  ): ImportSummary {
    switch (kind) {
      case "1d":
        return this.importProfiles(filePath);
      case "3d":
        if (!waveType) {
          throw new Error("A wave type (VP or VS) is required for 3D imports");
        }
        return this.importGrid(filePath, waveType);
      case "bibref":
        return this.importBibrefs(filePath);
    }
  }

  importProfiles(filePath: string): ImportSummary {
    const table = readCsvFile(filePath);
    requireColumns(table, PROFILE_COLUMNS);

    const records: ProfileRecord[] = table.rows.map((row) => ({
      depth: readNumber(row, "Depth (km)"),
      velocity: readNumber(row, "Velocity (km/s)"),
      waveType: readWaveType(row),
      sourceLabel: readText(row, "NFO"),
      referenceId: readText(row, "Author"),
    }));

    const summary = this.repository.transaction(() => {
      const result = emptySummary();
      for (const record of records) {
        if (this.repository.profileExists(record)) {
          result.skipped++;
          continue;
        }
        this.repository.insertProfile(record);
        result.imported++;
      }
      return result;
    });

    logger.debug(`Imported 1D profiles from ${filePath}`, summary);
    return summary;
  }

  importGrid(filePath: string, waveType: WaveType): ImportSummary {
    const table = readCsvFile(filePath);
    requireColumns(table, gridColumns(waveType), [SCALE_FACTOR_COLUMN]);

    const hasScaleFactor = table.columns.includes(SCALE_FACTOR_COLUMN);
    const records: GridRecord[] = table.rows.map((row) => ({
      longitude: readNumber(row, "Longitude"),
      latitude: readNumber(row, "Latitude"),
      depth: readNumber(row, "Depth"),
      velocity: readNumber(row, velocityColumn(waveType)),
      scaleFactor: readScaleFactor(row, hasScaleFactor),
      sourceLabel: readText(row, "NFO"),
      referenceId: readText(row, "Author"),
    }));

    const summary = this.repository.transaction(() => {
      const result = emptySummary();
      for (const record of records) {
        if (this.repository.gridPointExists(waveType, record)) {
          result.skipped++;
          continue;
        }
        this.repository.insertGridPoint(waveType, record);
        result.imported++;
      }
      return result;
    });

    logger.debug(
      `Imported 3D ${CODE_BY_WAVE_TYPE[waveType]} grid from ${filePath}`,
      summary,
    );
    return summary;
  }

  importBibrefs(filePath: string): ImportSummary {
    const table = readCsvFile(filePath);
    requireColumns(table, BIBREF_COLUMNS);

    const entries = table.rows.map((row) => ({
      author: readText(row, "Author"),
      bibref: readText(row, "Bibref"),
    }));

    const summary = this.repository.transaction(() => {
      const result = emptySummary();
      for (const { author, bibref } of entries) {
        const change = this.repository.upsertBibref(author, bibref);
        if (change === "inserted") result.imported++;
        else if (change === "updated") result.updated++;
        else result.skipped++;
      }
      return result;
    });

    logger.debug(`Imported bibrefs from ${filePath}`, summary);
    return summary;
  }
}
