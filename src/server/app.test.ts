import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { buildApp, SERVICE_NAME, toErrorResponse } from "./app";
import { VelocityModelService } from "../core/VelocityModelService";
import { VelocityRepository } from "../db/VelocityRepository";
import { openDatabase, IN_MEMORY } from "../db/database";
import { NoRecordsFoundError, OffsetOutOfRangeError } from "../errors";
import { logger } from "../utils/logger";
import packageJson from "../../package.json";

vi.mock("../utils/logger", () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
  },
}));

describe("app", () => {
  let repository: VelocityRepository;
  let app: FastifyInstance;

  beforeEach(async () => {
    repository = new VelocityRepository(openDatabase(IN_MEMORY));
    app = buildApp({
      service: new VelocityModelService(repository),
      corsOrigins: ["*"],
    });
    await app.ready();

    repository.insertProfile({
      depth: 0,
      velocity: 5.8,
      waveType: "P",
      sourceLabel: "CRUST1",
      referenceId: "Laske",
    });
    repository.insertProfile({
      depth: 35,
      velocity: 8.0,
      waveType: "P",
      sourceLabel: "CRUST1",
      referenceId: "Laske",
    });
    repository.insertGridPoint("P", {
      longitude: 7.5,
      latitude: 46,
      depth: 2,
      velocity: 5.9,
      scaleFactor: 1.0,
      sourceLabel: "ALPS",
      referenceId: "Diehl",
    });
  });

  afterEach(async () => {
    await app.close();
    repository.close();
    vi.clearAllMocks();
  });

  it("should describe the service on /", async () => {
    const response = await app.inject({ method: "GET", url: "/" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      service: SERVICE_NAME,
      version: packageJson.version,
    });
  });

  it("should serve a 1D model as plain text", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/1d/?author=laske&nfo=crust1",
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(response.body).toBe(
      [
        "1D CRUST1",
        " 2        vel,depth,vdamp,phase (f5.2,5x,f7.2,2x,f7.3,3x,a1)",
        " 5.80        0.00   001.000           P-VELOCITY MODEL",
        " 8.00       35.00   001.000",
      ].join("\n"),
    );
  });

  it("should accept routes without the trailing slash", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/1d?author=Laske&nfo=CRUST1&limit=1",
    });

    expect(response.statusCode).toBe(200);
    expect(response.body.split("\n")[1]).toBe(
      "# Showing 1-1 of 2 records (limit=1, offset=0)",
    );
  });

  it("should serve a 3D grid", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VP&author=diehl&include_r=true",
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(
      ["3D ALPS", "Longitude|Latitude|Depth|Vp", "7.5|46.0|2.0|5.9"].join("\n"),
    );
  });

  it("should treat an empty author as matching every author", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/1d/?author=&nfo=CRUST",
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(
      [
        "1D CRUST1",
        " 2        vel,depth,vdamp,phase (f5.2,5x,f7.2,2x,f7.3,3x,a1)",
        " 5.80        0.00   001.000           P-VELOCITY MODEL",
        " 8.00       35.00   001.000",
      ].join("\n"),
    );
  });

  it("should still require the author parameter", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VP",
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [{ loc: ["query", "author"], msg: "author is required" }],
    });
  });

  it("should accept on/off words for include_r", async () => {
    const accepted = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VP&author=diehl&include_r=YES",
    });
    const rejected = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VP&author=diehl&include_r=maybe",
    });

    expect(accepted.statusCode).toBe(200);
    expect(rejected.statusCode).toBe(422);
    expect(rejected.json()).toEqual({
      detail: [{ loc: ["query", "include_r"], msg: "Expected a boolean" }],
    });
  });

  it("should answer unknown routes in the same error shape", async () => {
    const response = await app.inject({ method: "GET", url: "/2d/" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ detail: "Not Found" });
  });

  it("should return 404 when nothing matches", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VS&author=diehl",
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      detail: "No VS data found for author: diehl",
    });
  });

  it("should return 400 for an offset past the end", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/1d/?author=Laske&nfo=CRUST1&offset=2",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      detail: "Offset 2 exceeds total records (2). Max offset: 1",
    });
  });

  it("should return 422 for invalid parameters", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/1d/?author=Laske&limit=0",
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [
        { loc: ["query", "nfo"], msg: "nfo is required" },
        { loc: ["query", "limit"], msg: "limit must be at least 1" },
      ],
    });
  });

  it("should reject an unknown wave type", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/3d/?wave_type=VX&author=diehl",
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [{ loc: ["query", "wave_type"], msg: "wave_type must be VP or VS" }],
    });
  });

  it("should list authors and NFOs as text", async () => {
    const authors = await app.inject({ method: "GET", url: "/authors" });
    const nfos = await app.inject({ method: "GET", url: "/nfos" });

    expect(authors.body).toBe("Diehl\nLaske\n");
    expect(nfos.body).toBe("ALPS\nCRUST1\n");
    expect(nfos.headers["content-type"]).toBe("text/plain; charset=utf-8");
  });

  it("should hide internal failures behind a generic 500", async () => {
    repository.close();

    const response = await app.inject({ method: "GET", url: "/authors" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ detail: "Internal server error" });
    expect(logger.error).toHaveBeenCalledTimes(1);

    // reopen so afterEach can close cleanly
    repository = new VelocityRepository(openDatabase(IN_MEMORY));
  });

  it("should add CORS headers and answers preflight requests", async () => {
    const get = await app.inject({ method: "GET", url: "/" });
    const preflight = await app.inject({ method: "OPTIONS", url: "/1d/" });

    expect(get.headers["access-control-allow-origin"]).toBe("*");
    expect(preflight.statusCode).toBe(204);
    expect(preflight.headers["access-control-allow-methods"]).toBe(
      "GET, OPTIONS",
    );
  });
});

describe("app with restricted origins", () => {
  it("should only echo allowed origins", async () => {
    const repository = new VelocityRepository(openDatabase(IN_MEMORY));
    const app = buildApp({
      service: new VelocityModelService(repository),
      corsOrigins: ["https://maps.example"],
    });

    const allowed = await app.inject({
      method: "GET",
      url: "/",
      headers: { origin: "https://maps.example" },
    });
    const denied = await app.inject({
      method: "GET",
      url: "/",
      headers: { origin: "https://other.example" },
    });

    expect(allowed.headers["access-control-allow-origin"]).toBe(
      "https://maps.example",
    );
    expect(allowed.headers.vary).toBe("Origin");
    expect(denied.headers["access-control-allow-origin"]).toBeUndefined();

    await app.close();
    repository.close();
  });
});

describe("toErrorResponse", () => {
  it("should map domain errors to status codes", () => {
    expect(toErrorResponse(new NoRecordsFoundError("none")).statusCode).toBe(404);
    expect(toErrorResponse(new OffsetOutOfRangeError(5, 3)).statusCode).toBe(400);
    expect(toErrorResponse(new ZodError([])).statusCode).toBe(422);
  });

  it("should not leak unexpected error messages", () => {
    expect(toErrorResponse(new Error("SQLITE_CORRUPT at /var/db"))).toEqual({
      statusCode: 500,
      body: { detail: "Internal server error" },
    });
  });
});
