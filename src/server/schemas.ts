import { z } from "zod";
import { DEFAULT_LIMIT, MAX_LIMIT } from "../core/pagination";
import { booleanText } from "../config/schemas";
import { WAVE_TYPE_BY_CODE } from "../types";

// Blank is allowed: an empty search term matches every record
const requiredText = (name: string) =>
  z.string({ required_error: `${name} is required` });

const queryFlag = booleanText({ message: "Expected a boolean" });

const limit = z.coerce
  .number({ invalid_type_error: "limit must be a number" })
  .int("limit must be an integer")
  .min(1, "limit must be at least 1")
  .max(MAX_LIMIT, `limit must be at most ${MAX_LIMIT}`)
  .default(DEFAULT_LIMIT);

const offset = z.coerce
  .number({ invalid_type_error: "offset must be a number" })
  .int("offset must be an integer")
  .min(0, "offset must be at least 0")
  .default(0);

export const Query1DSchema = z.object({
  author: requiredText("author"),
  nfo: requiredText("nfo"),
  limit,
  offset,
});

export const Query3DSchema = z
  .object({
    wave_type: z.enum(["VP", "VS"], {
      errorMap: () => ({ message: "wave_type must be VP or VS" }),
    }),
    author: requiredText("author"),
    include_r: queryFlag.default(false),
    limit,
    offset,
  })
  .transform((query) => ({
    waveType: WAVE_TYPE_BY_CODE[query.wave_type],
    author: query.author,
    includeR: query.include_r,
    limit: query.limit,
    offset: query.offset,
  }));
