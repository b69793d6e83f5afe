import { PaginationContext, ProfileRecord, WaveType } from "../types";
import { formatVelestField } from "./formatNumber";
import { formatPaginationNote } from "./pagination";

const P_FORMAT_DESCRIPTOR = "vel,depth,vdamp,phase (f5.2,5x,f7.2,2x,f7.3,3x,a1)";
const DAMPING = "   001.000";

const MODEL_TAGS: Record<WaveType, string> = {
  P: "           P-VELOCITY MODEL",
  S: "           S-VELOCITY MODEL",
};

function byDepth(a: ProfileRecord, b: ProfileRecord): number {
  return a.depth - b.depth;
}

export function formatProfileLine(record: ProfileRecord): string {
  const velocity = formatVelestField(record.velocity, "velocity");
  const depth = formatVelestField(record.depth, "depth");
  return ` ${velocity}${depth}${DAMPING}`;
}

function formatSection(
  records: ProfileRecord[],
  waveType: WaveType,
): string[] {
  if (records.length === 0) return [];

  const countLine =
    waveType === "P"
      ? ` ${records.length}        ${P_FORMAT_DESCRIPTOR}`
      : ` ${records.length}`;

  const lines = records.map((record, index) =>
    index === 0
      ? `${formatProfileLine(record)}${MODEL_TAGS[waveType]}`
      : formatProfileLine(record),
  );

  return [countLine, ...lines];
}

/**
 * Renders a 1D model in VELEST layout: a title line, an optional pagination
 * note, then the P section and the S section, each sorted by depth.
 * Returns "" for an empty page.
 */
export function formatProfile(
  records: ProfileRecord[],
  reference: string,
  pagination: PaginationContext,
): string {
  if (records.length === 0) return "";

  // Array.prototype.sort is stable, equal depths keep their query order
  const pWaves = records.filter((r) => r.waveType === "P").sort(byDepth);
  const sWaves = records.filter((r) => r.waveType === "S").sort(byDepth);

  const title = `1D ${records[0].sourceLabel}`;
  const lines = [reference ? `${title} ${reference}` : title];

  const note = formatPaginationNote(pagination, records.length);
  if (note) lines.push(note);

  lines.push(...formatSection(pWaves, "P"));
  lines.push(...formatSection(sWaves, "S"));

  return lines.join("\n");
}
