import path from "path";
import { z } from "zod";
import { CommandHandler, CommandContext } from "./CommandHandler";
import { openDatabase } from "../db/database";
import { VelocityRepository } from "../db/VelocityRepository";
import { Importer } from "../import/Importer";
import { WAVE_TYPE_BY_CODE, WaveType } from "../types";
import { logger } from "../utils/logger";

export const ImportKindSchema = z.enum(["1d", "3d", "bibref"]);

const WaveTypeCodeSchema = z.enum(["VP", "VS"]);

export function parseWaveTypeArg(
  value: string | undefined,
): WaveType | undefined {
  if (value === undefined) return undefined;
  const parsed = WaveTypeCodeSchema.safeParse(value.trim().toUpperCase());
  if (!parsed.success) {
    throw new Error(`Invalid wave type '${value}': expected vp or vs`);
  }
  return WAVE_TYPE_BY_CODE[parsed.data];
}

export class ImportCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<void> {
    const { config, args } = context;
    const [rawKind, file, rawWaveType] = args;

    const kind = ImportKindSchema.parse(rawKind);
    if (!file) {
      throw new Error("A file to import is required");
    }
    const waveType = parseWaveTypeArg(rawWaveType);
    if (kind === "3d" && !waveType) {
      throw new Error("3D imports need a wave type: vp or vs");
    }

    const filePath = path.resolve(file);
    const repository = new VelocityRepository(
      openDatabase(config.database.path),
    );
    try {
      const importer = new Importer(repository);
      const summary = importer.importFile(kind, filePath, waveType);
      logger.success(
        `Imported ${summary.imported} new, skipped ${summary.skipped}, ` +
          `updated ${summary.updated} from ${path.basename(filePath)}`,
      );
    } finally {
      repository.close();
    }
  }
}
