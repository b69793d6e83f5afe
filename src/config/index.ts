export { parseYamlFile } from "./yamlParser";
export { ZodConfigValidator } from "./ZodConfigValidator";
export { EnvResolver, ENV_PREFIX } from "./EnvResolver";
export { loadConfig, mergeConfig, effectiveLogLevel } from "./loadConfig";
export type { LoadConfigOptions } from "./loadConfig";
export * from "./schemas";
