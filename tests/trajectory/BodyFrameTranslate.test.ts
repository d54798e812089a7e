import { InvalidInputError } from "@/core/errors";
import { Rotation } from "@/math/Rotation";
import { translateToReference } from "@/trajectory/BodyFrameTranslate";
import type { Vector3 } from "@/types";
import { describe, expect, it } from "vitest";

const Z: Vector3 = [0, 0, 1];

function expectVectorClose(actual: Vector3 | undefined, expected: Vector3, digits = 12): void {
  expect(actual).toBeDefined();
  expect(actual?.[0]).toBeCloseTo(expected[0], digits);
  expect(actual?.[1]).toBeCloseTo(expected[1], digits);
  expect(actual?.[2]).toBeCloseTo(expected[2], digits);
}

describe("translateToReference", () => {
  const yaw90 = Rotation.fromAxisAngle(Z, Math.PI / 2);

  describe("zero boresight", () => {
    it("should return the position unchanged as a new array", () => {
      const position: Vector3 = [1.5, -2, 3];
      const result = translateToReference(position, yaw90, [0, 0, 0]);
      expect(result).toEqual([1.5, -2, 3]);
      expect(result).not.toBe(position);
    });
  });

  describe("single position", () => {
    it("should remove the lever arm without rotation", () => {
      expect(translateToReference([5, 5, 5], Rotation.identity(), [1, 0, 0])).toEqual([4, 5, 5]);
    });

    it("should remove the lever arm in the body frame", () => {
      // R⁻¹(R·p − b) = p − R⁻¹·b, and R⁻¹ maps x to −y for a 90° yaw
      expectVectorClose(translateToReference([10, 0, 0], yaw90, [1, 0, 0]), [10, 1, 0]);
    });
  });

  describe("batch", () => {
    it("should translate every row with its own attitude", () => {
      const out = translateToReference(
        [
          [5, 5, 5],
          [10, 0, 0],
        ],
        [Rotation.identity(), yaw90],
        [1, 0, 0]
      );
      expect(out).toHaveLength(2);
      expectVectorClose(out[0], [4, 5, 5]);
      expectVectorClose(out[1], [10, 1, 0]);
    });

    it("should return an empty batch for empty input", () => {
      const none: Vector3[] = [];
      expect(translateToReference(none, [], [1, 0, 0])).toEqual([]);
    });

    it("should reject sequences of different length", () => {
      expect(() =>
        translateToReference(
          [
            [1, 2, 3],
            [4, 5, 6],
          ],
          [yaw90],
          [1, 0, 0]
        )
      ).toThrow(/equal length/);
    });

    it("should reject a row that is not a 3-vector", () => {
      expect(() =>
        translateToReference(
          [
            [1, 2, 3],
            [4, 5],
          ],
          [yaw90, yaw90],
          [1, 0, 0]
        )
      ).toThrow(InvalidInputError);
    });

    it("should reject a non-finite boresight", () => {
      expect(() => translateToReference([1, 2, 3], yaw90, [Number.NaN, 0, 0])).toThrow(/boresight/);
    });
  });
});
