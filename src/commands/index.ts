export { CommandHandler, CliOptionsSchema } from "./CommandHandler";
export type { CommandContext, CliOptions } from "./CommandHandler";
export { ServeCommand } from "./ServeCommand";
export { ImportCommand, ImportKindSchema, parseWaveTypeArg } from "./ImportCommand";
export { ConfigCommand } from "./ConfigCommand";
