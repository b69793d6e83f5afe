import { z } from "zod";
import { AppConfig } from "../config";

export const CliOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  debug: z.boolean().optional(),
  host: z.string().optional(),
  port: z.string().optional(),
  database: z.string().optional(),
  pretty: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CommandContext {
  config: AppConfig;
  args: string[];
  options: CliOptions;
}

export abstract class CommandHandler {
  abstract execute(context: CommandContext): Promise<void>;
}
