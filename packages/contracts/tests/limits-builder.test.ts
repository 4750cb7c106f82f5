import { describe, expect, it } from "vitest";
import { buildLevelLimits, DEFAULT_LEVEL_LIMITS } from "../src";

describe("buildLevelLimits", () => {
  it("applies defaults", () => {
    const res = buildLevelLimits();
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({
      maxRooms: 256,
      maxRoomSize: 128,
      maxStringLength: 256,
      maxCoord: 1_000_000,
    });
    expect(res.value).toEqual(DEFAULT_LEVEL_LIMITS);
  });

  it("clamps room size and count to the hard ceilings", () => {
    const res = buildLevelLimits({ maxRoomSize: 5000, maxRooms: 0 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.maxRoomSize).toBe(1024);
    expect(res.value.maxRooms).toBe(1);
  });

  it("reports invalid values as LIMITS_INVALID", () => {
    const res = buildLevelLimits({ maxCoord: -1 });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("LIMITS_INVALID");
    expect(res.error.message).toContain("maxCoord");
  });
});
