import { InvalidInputError } from "@/core/errors";
import { isBatch, toVec3, toVec3Batch } from "@/core/shape";
import { describe, expect, it } from "vitest";

describe("shape", () => {
  describe("isBatch", () => {
    it("should distinguish a vector from a batch", () => {
      expect(isBatch([1, 2, 3])).toBe(false);
      expect(isBatch([[1, 2, 3]])).toBe(true);
    });

    it("should treat an empty array as a batch", () => {
      expect(isBatch([])).toBe(true);
    });
  });

  describe("toVec3", () => {
    it("should return a fresh tuple", () => {
      const input = [1, 2, 3];
      const v = toVec3(input);
      expect(v).toEqual([1, 2, 3]);
      expect(v).not.toBe(input);
    });

    it("should reject wrong lengths, non-arrays and non-numbers", () => {
      expect(() => toVec3([1, 2])).toThrow(InvalidInputError);
      expect(() => toVec3("abc")).toThrow(InvalidInputError);
      expect(() => toVec3([1, "2", 3])).toThrow(InvalidInputError);
      expect(() => toVec3([1, 2, Infinity], "offset")).toThrow("offset must contain finite numbers");
    });
  });

  describe("toVec3Batch", () => {
    it("should name the failing row", () => {
      expect(() => toVec3Batch([[1, 2, 3], [4]], "point")).toThrow("point[1] must have length 3, got 1");
    });
  });
});
