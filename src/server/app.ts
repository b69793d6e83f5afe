import Fastify, { FastifyInstance, FastifyReply } from "fastify";
import { ZodError } from "zod";
import { VelocityModelService } from "../core/VelocityModelService";
import { NoRecordsFoundError, OffsetOutOfRangeError } from "../errors";
import { logger } from "../utils/logger";
import { Query1DSchema, Query3DSchema } from "./schemas";
import packageJson from "../../package.json";

export const SERVICE_NAME = "Velocity Model Service";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

export interface AppOptions {
  service: VelocityModelService;
  corsOrigins: string[];
}

export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
}

export interface ErrorResponse {
  statusCode: number;
  body: { detail: string | ValidationIssue[] };
}

/**
 * Maps a failure to its HTTP status and JSON body. Anything unexpected
 * becomes a bare 500 so internals never reach the client.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof NoRecordsFoundError) {
    return { statusCode: 404, body: { detail: error.message } };
  }
  if (error instanceof OffsetOutOfRangeError) {
    return { statusCode: 400, body: { detail: error.message } };
  }
  if (error instanceof ZodError) {
    return {
      statusCode: 422,
      body: {
        detail: error.issues.map((issue) => ({
          loc: ["query", ...issue.path],
          msg: issue.message,
        })),
      },
    };
  }
  return { statusCode: 500, body: { detail: "Internal server error" } };
}

function hasClientStatus(
  error: unknown,
): error is { statusCode: number; message: string } {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

function sendText(reply: FastifyReply, text: string): FastifyReply {
  return reply.type(TEXT_CONTENT_TYPE).send(text);
}

function allowedOrigin(
  origins: string[],
  requestOrigin: string | undefined,
): string | undefined {
  if (origins.includes("*")) return "*";
  if (requestOrigin && origins.includes(requestOrigin)) return requestOrigin;
  return undefined;
}

export function buildApp(options: AppOptions): FastifyInstance {
  const { service, corsOrigins } = options;
  const app = Fastify({ logger: false, ignoreTrailingSlash: true });

  app.addHook("onRequest", async (request, reply) => {
    const origin = allowedOrigin(corsOrigins, request.headers.origin);
    if (origin) {
      reply.header("Access-Control-Allow-Origin", origin);
      if (origin !== "*") reply.header("Vary", "Origin");
    }
    reply.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Content-Type");
  });

  app.addHook("onResponse", async (request, reply) => {
    logger.debug(`${request.method} ${request.url} ${reply.statusCode}`, {
      ms: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (hasClientStatus(error)) {
      return reply.code(error.statusCode).send({ detail: error.message });
    }

    const { statusCode, body } = toErrorResponse(error);
    if (statusCode === 500) {
      logger.error(`${request.method} ${request.url} failed`, error);
    }
    return reply.code(statusCode).send(body);
  });

  app.setNotFoundHandler(async (request, reply) =>
    reply.code(404).send({ detail: "Not Found" }),
  );

  app.options("*", async (request, reply) => reply.code(204).send());

  app.get("/", async () => ({
    service: SERVICE_NAME,
    version: packageJson.version,
  }));

  app.get("/authors", async (request, reply) =>
    sendText(reply, service.listAuthors()),
  );

  app.get("/nfos", async (request, reply) =>
    sendText(reply, service.listNfos()),
  );

  app.get("/1d", async (request, reply) => {
    const query = Query1DSchema.parse(request.query);
    return sendText(reply, service.query1D(query));
  });

  app.get("/3d", async (request, reply) => {
    const query = Query3DSchema.parse(request.query);
    return sendText(reply, service.query3D(query));
  });

  return app;
}
