import { Vec3 } from "@/math/Vec3";
import { describe, expect, it } from "vitest";

describe("Vec3", () => {
  describe("create", () => {
    it("should create a vector with given coordinates", () => {
      expect(Vec3.create(1, 2, 3)).toEqual([1, 2, 3]);
    });
  });

  describe("add", () => {
    it("should add two vectors", () => {
      expect(Vec3.add([1, 2, 3], [4, 5, 6])).toEqual([5, 7, 9]);
    });
  });

  describe("subtract", () => {
    it("should subtract two vectors", () => {
      expect(Vec3.subtract([5, 7, 9], [1, 2, 3])).toEqual([4, 5, 6]);
    });
  });

  describe("scale", () => {
    it("should scale a vector by a scalar", () => {
      expect(Vec3.scale([1, -2, 3], 2)).toEqual([2, -4, 6]);
    });
  });

  describe("dot and cross", () => {
    it("should calculate dot product", () => {
      expect(Vec3.dot([1, 2, 3], [4, 5, 6])).toBe(32); // 4 + 10 + 18
    });

    it("should follow the right-hand rule for cross product", () => {
      expect(Vec3.cross([1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1]);
      expect(Vec3.cross([0, 1, 0], [0, 0, 1])).toEqual([1, 0, 0]);
    });
  });

  describe("length", () => {
    it("should calculate vector length", () => {
      expect(Vec3.length([2, 3, 6])).toBe(7);
    });
  });

  describe("normalize", () => {
    it("should normalize a vector to unit length", () => {
      const n = Vec3.normalize([0, 3, 4]);
      expect(n[1]).toBeCloseTo(0.6);
      expect(n[2]).toBeCloseTo(0.8);
    });

    it("should handle zero vector", () => {
      expect(Vec3.normalize([0, 0, 0])).toEqual([0, 0, 0]);
    });
  });

  describe("clone", () => {
    it("should return an equal but distinct array", () => {
      const v = Vec3.create(1, 2, 3);
      const c = Vec3.clone(v);
      expect(c).toEqual(v);
      expect(c).not.toBe(v);
    });
  });

  describe("isZero", () => {
    it("should detect only the exact zero vector", () => {
      expect(Vec3.isZero([0, 0, 0])).toBe(true);
      expect(Vec3.isZero([0, 1e-300, 0])).toBe(false);
    });
  });
});
