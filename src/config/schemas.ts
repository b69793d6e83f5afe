import { z } from "zod";

export const LogLevelSchema = z.enum(["error", "warn", "info", "debug"]);

export const ServerSchema = z.object({
  host: z.string().min(1, "Host cannot be empty").default("0.0.0.0"),
  port: z.coerce
    .number()
    .int("Port must be an integer")
    .min(0, "Port must be between 0 and 65535")
    .max(65535, "Port must be between 0 and 65535")
    .default(8001),
});

export const DatabaseSchema = z.object({
  path: z.string().min(1, "Database path cannot be empty").default("velmod.db"),
});

export const CorsSchema = z.object({
  origins: z
    .array(z.string().min(1, "Origin cannot be empty"))
    .min(1, "At least one origin is required")
    .default(["*"]),
});

const TRUE_WORDS = ["true", "1", "yes", "on"];
const FALSE_WORDS = ["false", "0", "no", "off"];

export interface BooleanTextOptions {
  // value for blank text; blank text is rejected when unset
  blank?: boolean;
  message?: string;
}

/**
 * Boolean that also accepts the usual words for on/off, as they arrive from
 * environment variables and query strings.
 */
export const booleanText = (options: BooleanTextOptions = {}) =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") return value;
      const normalized = value.trim().toLowerCase();
      if (TRUE_WORDS.includes(normalized)) return true;
      if (FALSE_WORDS.includes(normalized)) return false;
      if (normalized === "" && options.blank !== undefined) {
        return options.blank;
      }
      return value;
    },
    z.boolean({ invalid_type_error: options.message }),
  );

export const AppConfigSchema = z.object({
  environment: z
    .enum(["development", "production", "test"])
    .default("development"),
  debug: booleanText({ blank: false }).default(false),
  logLevel: LogLevelSchema.optional(),
  server: ServerSchema.default({}),
  database: DatabaseSchema.default({}),
  cors: CorsSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
// Config fragments before validation (YAML file, environment, CLI flags)
export type RawConfig = Record<string, unknown>;
export type ServerConfig = z.infer<typeof ServerSchema>;
