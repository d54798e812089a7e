import { InvalidInputError } from "@/core/errors";
import { chiSquareCdf, chiSquareQuantile, logGamma, regularizedLowerGamma } from "@/math/ChiSquare";
import { describe, expect, it } from "vitest";

describe("ChiSquare", () => {
  describe("logGamma", () => {
    it("should match factorials at integers", () => {
      expect(logGamma(1)).toBeCloseTo(0, 12);
      expect(logGamma(5)).toBeCloseTo(Math.log(24), 12);
    });

    it("should give ln √π at one half", () => {
      expect(logGamma(0.5)).toBeCloseTo(0.5 * Math.log(Math.PI), 12);
    });
  });

  describe("regularizedLowerGamma", () => {
    it("should reduce to 1 - e^-x for a = 1", () => {
      expect(regularizedLowerGamma(1, 0.5)).toBeCloseTo(1 - Math.exp(-0.5), 12);
      expect(regularizedLowerGamma(1, 7)).toBeCloseTo(1 - Math.exp(-7), 12);
    });

    it("should be zero at x = 0", () => {
      expect(regularizedLowerGamma(2.5, 0)).toBe(0);
    });
  });

  describe("chiSquareCdf", () => {
    it("should have the closed form 1 - e^(-x/2) for two degrees of freedom", () => {
      expect(chiSquareCdf(3, 2)).toBeCloseTo(1 - Math.exp(-1.5), 12);
    });
  });

  describe("chiSquareQuantile", () => {
    it("should match tabulated critical values", () => {
      expect(chiSquareQuantile(0.95, 1)).toBeCloseTo(3.841458820694124, 8);
      expect(chiSquareQuantile(0.99, 1)).toBeCloseTo(6.634896601021214, 8);
      expect(chiSquareQuantile(0.99, 3)).toBeCloseTo(11.344866730144373, 8);
    });

    it("should invert the closed form for two degrees of freedom", () => {
      expect(chiSquareQuantile(0.95, 2)).toBeCloseTo(-2 * Math.log(0.05), 8);
    });

    it("should round-trip through the CDF", () => {
      const x = chiSquareQuantile(0.9, 6);
      expect(chiSquareCdf(x, 6)).toBeCloseTo(0.9, 10);
    });

    it("should reject probabilities outside (0, 1)", () => {
      expect(() => chiSquareQuantile(0, 1)).toThrow(InvalidInputError);
      expect(() => chiSquareQuantile(1, 1)).toThrow(InvalidInputError);
    });

    it("should reject non-integer degrees of freedom", () => {
      expect(() => chiSquareQuantile(0.5, 0)).toThrow(InvalidInputError);
      expect(() => chiSquareQuantile(0.5, 1.5)).toThrow(InvalidInputError);
    });
  });
});
