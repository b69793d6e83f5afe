import { readFileSync, existsSync } from "fs";
import { parse as dotenvParse } from "dotenv";
import { expand } from "dotenv-expand";
import { RawConfig } from "./schemas";
import { logger } from "../utils/logger";

export const ENV_PREFIX = "VELMOD_";

type EnvMap = Record<string, string>;

function definedEntries(env: NodeJS.ProcessEnv): EnvMap {
  const result: EnvMap = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export class EnvResolver {
  /**
   * Reads a dotenv file and expands `${VAR}` references against the file
   * itself and the process environment. Missing files yield an empty map.
   */
  static loadEnvFile(file: string, processEnv: NodeJS.ProcessEnv): EnvMap {
    if (!existsSync(file)) return {};

    const content = readFileSync(file, "utf8");
    const parsed = dotenvParse(content);
    // expand() writes into processEnv, so hand it a copy
    const expanded = expand({ parsed, processEnv: definedEntries(processEnv) });

    logger.debug(`Loaded env file ${file}`, { keys: Object.keys(parsed) });
    return { ...expanded.parsed };
  }

  /**
   * Env file values first, real environment on top.
   */
  static resolve(
    envFile: string | undefined,
    processEnv: NodeJS.ProcessEnv,
  ): EnvMap {
    const fromFile = envFile ? this.loadEnvFile(envFile, processEnv) : {};
    return { ...fromFile, ...definedEntries(processEnv) };
  }

  /**
   * Maps `VELMOD_*` variables onto the config shape. Values stay strings;
   * the schema coerces and validates them.
   */
  static toConfig(env: EnvMap): RawConfig {
    const read = (name: string): string | undefined => {
      const value = env[`${ENV_PREFIX}${name}`];
      return value === undefined || value.trim() === "" ? undefined : value;
    };

    const config: RawConfig = {};
    const section = (key: string, values: RawConfig): void => {
      const defined = Object.entries(values).filter(([, v]) => v !== undefined);
      if (defined.length > 0) config[key] = Object.fromEntries(defined);
    };

    const environment = read("ENVIRONMENT");
    if (environment !== undefined) config.environment = environment;

    const debug = read("DEBUG");
    if (debug !== undefined) config.debug = debug;

    const logLevel = read("LOG_LEVEL");
    if (logLevel !== undefined) config.logLevel = logLevel.toLowerCase();

    section("server", { host: read("HOST"), port: read("PORT") });
    section("database", { path: read("DATABASE_PATH") });

    const origins = read("CORS_ORIGINS");
    if (origins !== undefined) {
      section("cors", {
        origins: origins
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0),
      });
    }

    return config;
  }
}
