import { CommandHandler, CommandContext } from "./CommandHandler";

export class ConfigCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<void> {
    const { config, options } = context;

    const jsonOutput = options.pretty
      ? JSON.stringify(config, null, 2)
      : JSON.stringify(config);

    console.log(jsonOutput);
  }
}
