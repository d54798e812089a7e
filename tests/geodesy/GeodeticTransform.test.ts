import { WGS84 } from "@/config/geodesyConfig";
import { InvalidInputError } from "@/core/errors";
import { ecefToGeodetic, geodeticToEcef, primeVerticalRadius } from "@/geodesy/GeodeticTransform";
import { Vec3 } from "@/math/Vec3";
import { describe, expect, it } from "vitest";

describe("GeodeticTransform", () => {
  describe("geodeticToEcef", () => {
    it("should place the equator/prime meridian point on the x axis", () => {
      expect(geodeticToEcef([0, 0, 0])).toEqual([WGS84.semiMajorAxis, 0, 0]);
    });

    it("should place the north pole at the semi-minor axis", () => {
      const [x, y, z] = geodeticToEcef([0, 90, 0]);
      expect(x).toBeCloseTo(0, 6);
      expect(y).toBeCloseTo(0, 6);
      expect(z).toBeCloseTo(6356752.314245, 5);
    });

    it("should add altitude along the ellipsoid normal", () => {
      const [x, y, z] = geodeticToEcef([90, 0, 100]);
      expect(x).toBeCloseTo(0, 6);
      expect(y).toBeCloseTo(WGS84.semiMajorAxis + 100, 6);
      expect(z).toBe(0);
    });
  });

  describe("ecefToGeodetic", () => {
    it("should map the x axis surface point to [0, 0, 0]", () => {
      const [lon, lat, alt] = ecefToGeodetic([WGS84.semiMajorAxis, 0, 0]);
      expect(lon).toBe(0);
      expect(lat).toBe(0);
      expect(alt).toBeCloseTo(0, 9);
    });

    it("should report latitude ±90 on the polar axis", () => {
      expect(ecefToGeodetic([0, 0, WGS84.semiMinorAxis])).toEqual([0, 90, 0]);
      const [, lat, alt] = ecefToGeodetic([0, 0, -WGS84.semiMinorAxis - 50]);
      expect(lat).toBe(-90);
      expect(alt).toBeCloseTo(50, 9);
    });

    it("should return [lon, lat, alt] in that order", () => {
      const [lon, lat] = ecefToGeodetic(geodeticToEcef([30, 10, 0]));
      expect(lon).toBeCloseTo(30, 9);
      expect(lat).toBeCloseTo(10, 9);
    });
  });

  describe("round trip", () => {
    it("should recover ECEF positions to better than a micrometer", () => {
      for (let lon = -170; lon <= 170; lon += 34) {
        for (let lat = -85; lat <= 85; lat += 17) {
          for (const alt of [-100, 0, 1500, 10000]) {
            const ecef = geodeticToEcef([lon, lat, alt]);
            const back = geodeticToEcef(ecefToGeodetic(ecef));
            expect(Vec3.distance(back, ecef)).toBeLessThan(1e-6);
          }
        }
      }
    });

    it("should recover geodetic coordinates", () => {
      const [lon, lat, alt] = ecefToGeodetic(geodeticToEcef([-122.4, 37.8, 250]));
      expect(lon).toBeCloseTo(-122.4, 9);
      expect(lat).toBeCloseTo(37.8, 9);
      expect(alt).toBeCloseTo(250, 6);
    });
  });

  describe("batch input", () => {
    it("should convert each row and keep the batch shape", () => {
      const coords = ecefToGeodetic([
        [WGS84.semiMajorAxis, 0, 0],
        [0, WGS84.semiMajorAxis, 0],
      ]);
      expect(coords).toHaveLength(2);
      const [second] = coords.slice(1);
      expect(second?.[0]).toBeCloseTo(90, 12);
      expect(second?.[1]).toBe(0);
      expect(second?.[2]).toBeCloseTo(0, 9);
    });

    it("should treat an empty array as an empty batch", () => {
      const none: number[][] = [];
      expect(ecefToGeodetic(none)).toEqual([]);
      expect(geodeticToEcef(none)).toEqual([]);
    });
  });

  describe("invalid input", () => {
    it("should reject vectors that are not length 3", () => {
      expect(() => ecefToGeodetic([1, 2])).toThrow(InvalidInputError);
      expect(() => geodeticToEcef([1, 2, 3, 4])).toThrow(InvalidInputError);
    });

    it("should reject a ragged batch", () => {
      expect(() =>
        ecefToGeodetic([
          [1, 2, 3],
          [1, 2],
        ])
      ).toThrow(/position\[1\]/);
    });

    it("should reject non-finite entries", () => {
      expect(() => ecefToGeodetic([1, Number.NaN, 3])).toThrow(InvalidInputError);
    });
  });

  describe("primeVerticalRadius", () => {
    it("should equal the semi-major axis at the equator", () => {
      expect(primeVerticalRadius(0)).toBe(WGS84.semiMajorAxis);
    });
  });
});
