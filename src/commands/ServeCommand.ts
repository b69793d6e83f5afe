import { CommandHandler, CommandContext } from "./CommandHandler";
import { VelocityModelService } from "../core/VelocityModelService";
import { openDatabase } from "../db/database";
import { VelocityRepository } from "../db/VelocityRepository";
import { buildApp, SERVICE_NAME } from "../server/app";
import { logger } from "../utils/logger";

export class ServeCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<void> {
    const { config } = context;
    const { host, port } = config.server;

    const repository = new VelocityRepository(
      openDatabase(config.database.path),
    );
    const app = buildApp({
      service: new VelocityModelService(repository),
      corsOrigins: config.cors.origins,
    });

    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down`);
      await app.close();
      repository.close();
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          logger.error("Shutdown failed", error);
          process.exitCode = 1;
        });
      });
    }

    try {
      await app.listen({ host, port });
    } catch (error) {
      repository.close();
      throw error;
    }

    logger.success(`${SERVICE_NAME} listening on http://${host}:${port}`);
    logger.debug(`Database: ${config.database.path}`);
  }
}
