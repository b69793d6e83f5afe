import { existsSync, statSync } from "fs";
import path from "path";

export const CONFIG_FILENAMES = ["velmod.yaml", "velmod.yml"];

export function findFileUpwards(
  startDir: string,
  candidateFilenames: string[] = CONFIG_FILENAMES,
): string | null {
  let current = path.resolve(startDir);
  while (true) {
    for (const name of candidateFilenames) {
      const p = path.join(current, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

/**
 * An explicit path is used as given (a directory is searched upwards from
 * there). Without one, the default config is searched from `cwd` upwards.
 * Returns null when nothing is found.
 */
export function resolveConfigPath(
  input?: string,
  cwd: string = process.cwd(),
): string | null {
  if (input && input.trim().length > 0) {
    const given = path.resolve(cwd, input);
    if (!existsSync(given)) return null;
    if (statSync(given).isDirectory()) {
      return findFileUpwards(given);
    }
    return given;
  }
  return findFileUpwards(cwd);
}
