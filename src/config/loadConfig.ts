import path from "path";
import { AppConfig, RawConfig } from "./schemas";
import { parseYamlFile } from "./yamlParser";
import { EnvResolver } from "./EnvResolver";
import { ZodConfigValidator } from "./ZodConfigValidator";
import { resolveConfigPath } from "../utils/findUp";
import { LogLevelName } from "../utils/logger";
import { ConfigFileNotFoundError } from "../errors";

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RawConfig;
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mergeConfig(base: RawConfig, patch: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeConfig(current, value)
        : value;
  }
  return merged;
}

/**
 * Builds the application config from, lowest precedence first: schema
 * defaults, the YAML file, the `.env` beside it, the process environment and
 * the given overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configPath = resolveConfigPath(options.configPath, cwd);
  if (options.configPath && !configPath) {
    throw new ConfigFileNotFoundError(path.resolve(cwd, options.configPath));
  }

  const fromFile = configPath ? parseYamlFile(configPath) : {};
  const baseDir = configPath ? path.dirname(configPath) : cwd;
  const resolvedEnv = EnvResolver.resolve(path.join(baseDir, ".env"), env);

  let raw = mergeConfig(fromFile, EnvResolver.toConfig(resolvedEnv));
  raw = mergeConfig(raw, options.overrides ?? {});

  const config = ZodConfigValidator.validate(raw);

  // Relative database paths are relative to the config file
  if (config.database.path !== ":memory:") {
    config.database.path = path.resolve(baseDir, config.database.path);
  }

  return config;
}

export function effectiveLogLevel(config: AppConfig): LogLevelName {
  return config.logLevel ?? (config.debug ? "debug" : "info");
}
