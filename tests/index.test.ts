import * as lazyAngle from "@/index";
import { describe, expect, it } from "vitest";

describe("package entry point", () => {
  it("should expose the unit modules and collaborators", () => {
    const { angle, Angle, Trig, formatAngle } = lazyAngle;

    const { angle: converted, value } = Angle.toDegrees(angle("0.5", "r"));
    expect(value).toBe(28.64788975654116);
    expect(formatAngle(converted)).toBe("0.5㎭");
    expect(Trig.cos(Angle.degrees(180)).value).toBe(-1);
  });

  it("should expose the error classes", () => {
    expect(new lazyAngle.InvalidAngleError("bad").name).toBe("InvalidAngleError");
    expect(new lazyAngle.AngleContractError("bad").name).toBe("AngleContractError");
  });
});
