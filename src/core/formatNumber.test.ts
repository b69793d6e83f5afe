import { describe, it, expect } from "vitest";
import {
  formatFixed,
  formatFloat,
  formatVelestField,
  toFixedHalfEven,
} from "./formatNumber";

describe("formatFixed", () => {
  it("should pad to the minimum width", () => {
    expect(formatFixed(5, 4, 2)).toBe("5.00");
    expect(formatFixed(5, 7, 2)).toBe("   5.00");
  });

  it("should never truncate values wider than the field", () => {
    expect(formatFixed(123.456, 4, 2)).toBe("123.46");
  });

  it("should keep the sign of negative zero", () => {
    expect(formatFixed(-0, 5, 2)).toBe("-0.00");
  });

  it("should keep the sign of small negatives that round to zero", () => {
    expect(formatFixed(-0.001, 5, 2)).toBe("-0.00");
  });

  it("should round exact ties to the even digit", () => {
    expect(formatFixed(5.625, 4, 2)).toBe("5.62");
    expect(formatFixed(6.875, 4, 2)).toBe("6.88");
    expect(formatFixed(12.375, 5, 2)).toBe("12.38");
    expect(formatFixed(-0.125, 5, 2)).toBe("-0.12");
  });
});

describe("toFixedHalfEven", () => {
  it("should round ties to even at any precision", () => {
    expect(toFixedHalfEven(0.5, 0)).toBe("0");
    expect(toFixedHalfEven(1.5, 0)).toBe("2");
    expect(toFixedHalfEven(2.5, 0)).toBe("2");
    expect(toFixedHalfEven(0.375, 2)).toBe("0.38");
  });

  it("should round values that only look like ties by their stored value", () => {
    // both are stored just below the tie
    expect(toFixedHalfEven(1.005, 2)).toBe("1.00");
    expect(toFixedHalfEven(1.015, 2)).toBe("1.01");
  });

  it("should leave non-ties to toFixed", () => {
    expect(toFixedHalfEven(5.8, 2)).toBe("5.80");
    expect(toFixedHalfEven(3.14159, 3)).toBe("3.142");
  });
});

describe("formatVelestField", () => {
  it("should format velocities with two decimals", () => {
    expect(formatVelestField(5.8, "velocity")).toBe("5.80");
    expect(formatVelestField(8, "velocity")).toBe("8.00");
    expect(formatVelestField(10.123, "velocity")).toBe("10.12");
  });

  it("should use an 8-space lead and 4-character field for shallow depths", () => {
    expect(formatVelestField(5, "depth")).toBe("        5.00");
    expect(formatVelestField(0, "depth")).toBe("        0.00");
  });

  it("should use a 7-space lead and 5-character field from 10 km", () => {
    expect(formatVelestField(12.5, "depth")).toBe("       12.50");
    expect(formatVelestField(10, "depth")).toBe("       10.00");
  });

  it("should use a 7-space lead and keeps the minus sign for negative depths", () => {
    expect(formatVelestField(-3.25, "depth")).toBe("       -3.25");
  });

  it("should round tied velocities and depths to even", () => {
    expect(formatVelestField(5.625, "velocity")).toBe("5.62");
    expect(formatVelestField(2.125, "depth")).toBe("        2.12");
    expect(formatVelestField(6.875, "depth")).toBe("        6.88");
  });

  it("should treat negative zero as a negative depth", () => {
    expect(formatVelestField(-0, "depth")).toBe("       -0.00");
  });
});

describe("formatFloat", () => {
  it("should always write a decimal point for whole numbers", () => {
    expect(formatFloat(1)).toBe("1.0");
    expect(formatFloat(35)).toBe("35.0");
    expect(formatFloat(100)).toBe("100.0");
    expect(formatFloat(0)).toBe("0.0");
  });

  it("should keep the shortest round-trip digits", () => {
    expect(formatFloat(5.8)).toBe("5.8");
    expect(formatFloat(-3.5)).toBe("-3.5");
    expect(formatFloat(123.456)).toBe("123.456");
    expect(formatFloat(0.25)).toBe("0.25");
    expect(formatFloat(0.1 + 0.2)).toBe("0.30000000000000004");
  });

  it("should write negative zero with its sign", () => {
    expect(formatFloat(-0)).toBe("-0.0");
  });

  it("should switch to scientific notation below 1e-4", () => {
    expect(formatFloat(0.0001)).toBe("0.0001");
    expect(formatFloat(0.00001)).toBe("1e-05");
    expect(formatFloat(-0.000025)).toBe("-2.5e-05");
  });

  it("should switch to scientific notation from 1e16", () => {
    expect(formatFloat(1e15)).toBe("1000000000000000.0");
    expect(formatFloat(1e16)).toBe("1e+16");
    expect(formatFloat(1.5e16)).toBe("1.5e+16");
  });

  it("should name non-finite values", () => {
    expect(formatFloat(Number.NaN)).toBe("nan");
    expect(formatFloat(Number.POSITIVE_INFINITY)).toBe("inf");
    expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("-inf");
  });
});
