import { Degree } from "@/angle/Degree";
import { DMS } from "@/angle/DMS";
import { Gradian } from "@/angle/Gradian";
import { Radian } from "@/angle/Radian";
import { expectError, expectOk } from "@test/helpers/angleHelpers";
import { describe, expect, it } from "vitest";

describe("Gradian", () => {
  describe("init", () => {
    it("should create an angle with only gradians set", () => {
      expect(Gradian.init(40)).toEqual({ kind: "gradians", g: 40 });
    });

    it("should return the canonical zero for zero gradians", () => {
      expect(Gradian.init(0)).toEqual({ kind: "zero", d: 0, r: 0, g: 0 });
    });
  });

  describe("parse", () => {
    it("should parse with or without the gradian sign", () => {
      expect(expectOk(Gradian.parse("13"))).toEqual({ kind: "gradians", g: 13 });
      expect(expectOk(Gradian.parse("13.2ᵍ"))).toEqual({ kind: "gradians", g: 13.2 });
    });

    it("should fail on empty text", () => {
      expect(expectError(Gradian.parse(""))).toEqual({
        kind: "parse",
        message: "Unable to parse value as gradians",
      });
    });
  });

  describe("ensure", () => {
    it("should return the same angle when gradians are present", () => {
      const angle = Gradian.init(10);
      expect(Gradian.ensure(angle)).toBe(angle);
    });

    it("should convert from degrees", () => {
      expect(Gradian.ensure(Degree.init(90)).g).toBe(100);
    });

    it("should convert from radians", () => {
      expect(Gradian.ensure(Radian.init(1)).g).toBe(63.66197723675813);
    });

    it("should prefer radians over degrees as the source", () => {
      const both = Degree.ensure(Radian.init(1));
      expect(Gradian.ensure(both).g).toBe(63.66197723675813);
    });

    it("should pivot DMS through degrees", () => {
      const ensured = Gradian.ensure(DMS.init(90, 0, 0));
      expect(ensured.g).toBe(100);
      expect(ensured.d).toBe(90);
      expect(ensured.r).toBeUndefined();
    });
  });

  describe("toGradians", () => {
    it("should return the updated angle and its gradians", () => {
      const { angle, value } = Gradian.toGradians(Radian.init(0.5));
      expect(value).toBe(31.830988618379067);
      expect(angle).toEqual({ kind: "radians", r: 0.5, g: 31.830988618379067 });
    });
  });

  it("should not define its own absolute value", () => {
    expect("abs" in Gradian).toBe(false);
  });
});
