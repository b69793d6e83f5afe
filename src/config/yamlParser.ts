import { readFileSync, existsSync } from "fs";
import { parse } from "yaml";
import { RawConfig } from "./schemas";
import { ConfigFileNotFoundError, ConfigParseError } from "../errors";

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a YAML config file into an unvalidated config fragment. An empty
 * file is an empty fragment.
 */
export function parseYamlFile(filePath: string): RawConfig {
  if (!existsSync(filePath)) {
    throw new ConfigFileNotFoundError(filePath);
  }

  let parsed: unknown;
  try {
    const content = readFileSync(filePath, "utf8");
    parsed = parse(content);
  } catch (error) {
    throw new ConfigParseError(filePath, error);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigParseError(
      filePath,
      undefined,
      `Config file must contain a mapping: ${filePath}`,
    );
  }
  return parsed;
}
