import { VelocityRepository } from "../db/VelocityRepository";
import { CODE_BY_WAVE_TYPE, GridQuery, ProfileQuery } from "../types";
import { formatGrid } from "./formatGrid";
import { formatProfile } from "./formatProfile";
import { resolvePage } from "./pagination";
import { logger } from "../utils/logger";

function formatNameList(names: string[]): string {
  return names.length > 0 ? `${names.join("\n")}\n` : "";
}

/**
 * Answers model queries as response-ready text. Holds no per-request state.
 */
export class VelocityModelService {
  constructor(private readonly repository: VelocityRepository) {}

  query1D(query: ProfileQuery): string {
    const { author, nfo, offset, limit } = query;
    const filter = { author, nfo };

    const totalCount = this.repository.countProfiles(filter);
    const pagination = resolvePage(
      totalCount,
      offset,
      limit,
      () => `No data found for author: ${author} and NFO: ${nfo}`,
    );

    const records = this.repository.listProfiles(filter, offset, limit);
    const bibref = this.repository.findBibref(author);

    logger.debug(`1D query matched ${totalCount} records`, {
      author,
      nfo,
      returned: records.length,
    });
    return formatProfile(records, bibref, pagination);
  }

  query3D(query: GridQuery): string {
    const { waveType, author, includeR, offset, limit } = query;

    const totalCount = this.repository.countGrid(waveType, author);
    const pagination = resolvePage(
      totalCount,
      offset,
      limit,
      () =>
        `No ${CODE_BY_WAVE_TYPE[waveType]} data found for author: ${author}`,
    );

    const records = this.repository.listGrid(waveType, author, offset, limit);
    const bibref = this.repository.findBibref(author);

    logger.debug(`3D query matched ${totalCount} records`, {
      waveType,
      author,
      returned: records.length,
    });
    return formatGrid(records, waveType, includeR, bibref, pagination);
  }

  listAuthors(): string {
    return formatNameList(this.repository.listAuthors());
  }

  listNfos(): string {
    return formatNameList(this.repository.listNfos());
  }
}
