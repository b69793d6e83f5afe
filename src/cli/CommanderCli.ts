import path from "path";
import { Argument, Command } from "commander";
import { Command as VelmodCommand } from "../types/index";
import { loadConfig, effectiveLogLevel, RawConfig } from "../config";
import { logger, LogLevel, parseLogLevel } from "../utils/logger";
import {
  ServeCommand,
  ImportCommand,
  ConfigCommand,
  CommandContext,
  CommandHandler,
  CliOptions,
  CliOptionsSchema,
} from "../commands";
import packageJson from "../../package.json";

function flagLogLevel(options: CliOptions): LogLevel | undefined {
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.INFO;
  if (options.quiet) return LogLevel.WARN;
  return undefined;
}

/**
 * Config values given as flags. Paths are made absolute here so they stay
 * relative to where the command was run, not to the config file.
 */
export function overridesFromOptions(options: CliOptions): RawConfig {
  return {
    server: { host: options.host, port: options.port },
    database: {
      path: options.database ? path.resolve(options.database) : undefined,
    },
  };
}

export class CommanderCli {
  private program: Command;
  private commandHandlers: Map<VelmodCommand, CommandHandler> = new Map();

  constructor() {
    this.program = new Command();
    this.setupCommandHandlers();
    this.setupProgram();
  }

  private setupCommandHandlers(): void {
    this.commandHandlers.set("serve", new ServeCommand());
    this.commandHandlers.set("import", new ImportCommand());
    this.commandHandlers.set("config", new ConfigCommand());
  }

  private setupProgram(): void {
    this.program
      .name("velmod")
      .description("Serve 1D and 3D seismic velocity models over HTTP")
      .version(packageJson.version);

    this.program
      .option(
        "--config <file>",
        "Use a specific config file (default: velmod.yaml, searched upwards)",
      )
      .option("-v, --verbose", "Increase logging verbosity")
      .option("-q, --quiet", "Reduce logging output")
      .option("-d, --debug", "Enable debug logging");

    this.program
      .command("serve")
      .description("Start the HTTP API")
      .option("--host <host>", "Interface to bind")
      .option("--port <port>", "Port to listen on")
      .option("--database <path>", "SQLite database file")
      .action(async (options, command) => {
        await this.executeCommand("serve", [], command);
      });

    this.program
      .command("import")
      .description("Load a CSV file of velocity models or references")
      .addArgument(
        new Argument("<kind>", "What the file contains").choices([
          "1d",
          "3d",
          "bibref",
        ]),
      )
      .argument("<file>", "CSV file to import")
      .argument("[waveType]", "vp or vs, required for 3d")
      .option("--database <path>", "SQLite database file")
      .action(async (kind, file, waveType, options, command) => {
        const args = waveType ? [kind, file, waveType] : [kind, file];
        await this.executeCommand("import", args, command);
      });

    this.program
      .command("config")
      .description("Show the resolved config object as minified JSON")
      .option("--pretty", "Format JSON output with indentation")
      .action(async (options, command) => {
        await this.executeCommand("config", [], command);
      });
  }

  private async executeCommand(
    command: VelmodCommand,
    args: string[],
    commandInstance: Command,
  ): Promise<void> {
    const globalOpts = commandInstance.parent?.opts() ?? {};
    const commandOpts = commandInstance.opts();
    const options = CliOptionsSchema.parse({ ...globalOpts, ...commandOpts });

    // Flags apply before the config loads so config errors honour --debug
    const fromFlags = flagLogLevel(options);
    if (fromFlags !== undefined) logger.setLevel(fromFlags);

    const config = loadConfig({
      configPath: options.config,
      overrides: overridesFromOptions(options),
    });
    logger.setLevel(fromFlags ?? parseLogLevel(effectiveLogLevel(config)));

    const handler = this.commandHandlers.get(command);
    if (!handler) {
      throw new Error(`No handler found for command: ${command}`);
    }

    const context: CommandContext = { config, args, options };
    await handler.execute(context);
  }

  async parse(args: string[]): Promise<void> {
    await this.program.parseAsync(args);
  }
}
