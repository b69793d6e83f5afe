import { GridRecord, PaginationContext, WaveType } from "../types";
import { formatFloat } from "./formatNumber";
import { formatPaginationNote } from "./pagination";

export const DEFAULT_SCALE_FACTOR = 1.0;

/**
 * The R column is only worth sending when the caller asked for it and at
 * least one point carries something other than the default. A missing value
 * counts as non-default; it is rendered as 1.0.
 */
export function shouldIncludeScaleFactor(
  records: GridRecord[],
  includeR: boolean,
): boolean {
  return (
    includeR &&
    records.some((record) => record.scaleFactor !== DEFAULT_SCALE_FACTOR)
  );
}

export function formatGridHeader(
  waveType: WaveType,
  withScaleFactor: boolean,
): string {
  const velocityColumn = waveType === "P" ? "Vp" : "Vs";
  const header = `Longitude|Latitude|Depth|${velocityColumn}`;
  return withScaleFactor ? `${header}|R` : header;
}

export function formatGridRow(
  record: GridRecord,
  withScaleFactor: boolean,
): string {
  const values = [
    record.longitude,
    record.latitude,
    record.depth,
    record.velocity,
  ];
  if (withScaleFactor) {
    values.push(record.scaleFactor ?? DEFAULT_SCALE_FACTOR);
  }
  return values.map(formatFloat).join("|");
}

export function formatGrid(
  records: GridRecord[],
  waveType: WaveType,
  includeR: boolean,
  reference: string,
  pagination: PaginationContext,
): string {
  if (records.length === 0) return "";

  const withScaleFactor = shouldIncludeScaleFactor(records, includeR);

  const title = `3D ${records[0].sourceLabel}`;
  const lines = [reference ? `${title} ${reference}` : title];

  const note = formatPaginationNote(pagination, records.length);
  if (note) lines.push(note);

  lines.push(formatGridHeader(waveType, withScaleFactor));
  for (const record of records) {
    lines.push(formatGridRow(record, withScaleFactor));
  }

  return lines.join("\n");
}
