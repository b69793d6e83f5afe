import { describe, it, expect } from "vitest";
import {
  formatError,
  InvalidRowError,
  MissingColumnsError,
  OffsetOutOfRangeError,
} from "./errors";

const RED_BOLD = "\u001B[31m\u001B[1m";
const DIM = "\u001B[2m";
const RESET = "\u001B[0m";

describe("errors", () => {
  it("should describe an offset past the end", () => {
    const error = new OffsetOutOfRangeError(12, 10);

    expect(error.message).toBe(
      "Offset 12 exceeds total records (10). Max offset: 9",
    );
    expect(error.offset).toBe(12);
    expect(error.totalCount).toBe(10);
  });

  it("should list optional columns only when there are some", () => {
    const error = new MissingColumnsError(["Author"], ["Bibref"], [
      "Author",
      "Bibref",
    ]);

    expect(error.message).toBe(
      "Missing required columns: Author. Available columns: Bibref. " +
        "Required: Author, Bibref",
    );
  });

  describe("formatError", () => {
    it("should format known errors by type", () => {
      const error = new InvalidRowError(4, "Depth", "deep");

      expect(formatError(error)).toBe(
        `${RED_BOLD}✗ InvalidRow${RESET}\n` +
          `${DIM}Row 4: column 'Depth' is not a number ('deep')${RESET}`,
      );
    });

    it("should label anything else as unexpected", () => {
      expect(formatError(new TypeError("boom"))).toBe(
        `${RED_BOLD}✗ Unexpected Error: TypeError${RESET}\n${DIM}boom${RESET}`,
      );
      expect(formatError("plain text")).toBe(
        `${RED_BOLD}✗ Unexpected Error: string${RESET}\n${DIM}plain text${RESET}`,
      );
    });

    it("should append the stack trace on request", () => {
      const error = new OffsetOutOfRangeError(1, 1);

      expect(formatError(error, true)).toContain(`\n\n${DIM}${error.stack}`);
    });
  });
});
