import { Angle } from "@/angle/Angle";
import { isZero, representationOf } from "@/angle/AngleValue";
import { Degree } from "@/angle/Degree";
import { DMS } from "@/angle/DMS";
import { Radian, TAU } from "@/angle/Radian";
import { AngleContractError } from "@/errors/AngleErrors";
import { formatAngle } from "@/format/AngleFormatter";
import { describe, expect, it } from "vitest";

describe("Angle", () => {
  describe("zero", () => {
    it("should carry degrees, radians and gradians", () => {
      expect(Angle.zero()).toEqual({ kind: "zero", d: 0, r: 0, g: 0 });
    });

    it("should be what every scalar unit returns for zero", () => {
      expect(Angle.degrees(0)).toEqual(Angle.zero());
      expect(Angle.radians(0)).toEqual(Angle.zero());
      expect(Angle.gradians(0)).toEqual(Angle.zero());
    });

    it("should display the same as a zero DMS angle", () => {
      expect(formatAngle(Angle.dms(0, 0, 0))).toBe(formatAngle(Angle.zero()));
      expect(isZero(Angle.dms(0))).toBe(true);
    });
  });

  describe("constructors", () => {
    it("should delegate to the unit modules", () => {
      expect(Angle.degrees(13)).toEqual({ kind: "degrees", d: 13 });
      expect(Angle.radians(0.25)).toEqual({ kind: "radians", r: 0.25 });
      expect(Angle.gradians(40)).toEqual({ kind: "gradians", g: 40 });
      expect(Angle.dms(90, 30, 50)).toEqual({ kind: "dms", dms: [90, 30, 50] });
    });
  });

  describe("conversions", () => {
    it("should read an angle back in every unit", () => {
      const { angle: a1, value: r } = Angle.toRadians(Angle.degrees(180));
      const { angle: a2, value: g } = Angle.toGradians(a1);
      const { angle: a3, value: dms } = Angle.toDMS(a2);
      const { angle: a4, value: d } = Angle.toDegrees(a3);

      expect(r).toBe(Math.PI);
      expect(g).toBe(200);
      expect(dms).toEqual([180, 0, 0]);
      expect(d).toBe(180);
      expect(a4).toEqual({ kind: "degrees", d: 180, r: Math.PI, g: 200, dms: [180, 0, 0] });
    });

    it("should compute each representation at most once", () => {
      const first = Angle.toRadians(Angle.degrees(45));
      const second = Angle.toRadians(first.angle);
      expect(second.angle).toBe(first.angle);
    });
  });

  describe("representationOf", () => {
    it("should rank radians, then degrees, then gradians, then DMS", () => {
      const dms = Angle.dms(10, 30);
      const withDegrees = Degree.ensure(dms);
      const withRadians = Radian.ensure(withDegrees);

      expect(representationOf(dms)).toBe("dms");
      expect(representationOf(Angle.gradians(10))).toBe("gradians");
      expect(representationOf(withDegrees)).toBe("degrees");
      expect(representationOf(withRadians)).toBe("radians");
      expect(representationOf(Angle.zero())).toBe("radians");
    });
  });

  describe("absoluteValue", () => {
    it("should normalize radians", () => {
      expect(Angle.absoluteValue(Angle.radians(7))).toEqual({ kind: "radians", r: 7 - TAU });
    });

    it("should normalize degrees", () => {
      expect(Angle.absoluteValue(Angle.degrees(-270))).toEqual({ kind: "degrees", d: 90 });
    });

    it("should normalize DMS with the complement rule", () => {
      expect(Angle.absoluteValue(Angle.dms(-270, 15, 45))).toEqual({ kind: "dms", dms: [90, 45, 15] });
    });

    it("should normalize gradians through degrees", () => {
      expect(Angle.absoluteValue(Angle.gradians(-100))).toEqual({ kind: "degrees", d: 270 });
    });

    it("should prefer cached radians over the constructed degrees", () => {
      const withRadians = Radian.ensure(Angle.degrees(-270));
      const result = Angle.absoluteValue(withRadians);
      expect(result.kind).toBe("radians");
      expect(result.r).toBeCloseTo(Math.PI / 2, 12);
    });

    it("should prefer cached degrees over the constructed DMS", () => {
      const withDegrees = Degree.ensure(DMS.init(-270, 15, 45));
      const result = Angle.absoluteValue(withDegrees);
      expect(result.kind).toBe("degrees");
      expect(result.d).toBeCloseTo(90.2625, 10);
    });

    it("should prefer cached degrees over the constructed gradians", () => {
      const withDMS = DMS.ensure(Angle.gradians(450));
      expect(Angle.absoluteValue(withDMS)).toEqual({ kind: "degrees", d: 45 });
    });

    it("should keep zero as zero", () => {
      expect(Angle.absoluteValue(Angle.zero())).toEqual(Angle.zero());
    });

    it("should throw for an angle with no representation", () => {
      const broken = { ...Angle.degrees(45) };
      Reflect.deleteProperty(broken, "d");
      expect(() => Angle.absoluteValue(broken)).toThrow(AngleContractError);
    });
  });
});
