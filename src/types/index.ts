export type WaveType = "P" | "S";

// Spelling used by the HTTP API, the CSV files and the database
export type WaveTypeCode = "VP" | "VS";

export const WAVE_TYPE_BY_CODE: Record<WaveTypeCode, WaveType> = {
  VP: "P",
  VS: "S",
};

export const CODE_BY_WAVE_TYPE: Record<WaveType, WaveTypeCode> = {
  P: "VP",
  S: "VS",
};

export interface ProfileRecord {
  depth: number; // km, negative above sea level
  velocity: number; // km/s
  waveType: WaveType;
  sourceLabel: string; // NFO
  referenceId: string; // author
}

export interface GridRecord {
  longitude: number;
  latitude: number;
  depth: number;
  velocity: number;
  scaleFactor: number | null; // R
  sourceLabel: string;
  referenceId: string;
}

export interface PaginationContext {
  totalCount: number;
  offset: number;
  limit: number;
}

export interface ProfileQuery {
  author: string;
  nfo: string;
  limit: number;
  offset: number;
}

export interface GridQuery {
  waveType: WaveType;
  author: string;
  includeR: boolean;
  limit: number;
  offset: number;
}

export interface ImportSummary {
  imported: number;
  skipped: number;
  updated: number;
}

export type ImportKind = "1d" | "3d" | "bibref";

export type Command = "serve" | "import" | "config";
