import { describe, expect, it } from "vitest";

import { Duration, InvalidRequestError } from "../src";

describe("Duration.parse", () => {
  it.each([
    ["15min", 15 * 60_000],
    ["15T", 15 * 60_000],
    ["1H", 3_600_000],
    ["H", 3_600_000],
    ["3h", 3 * 3_600_000],
    ["30s", 30_000],
    ["1D", 86_400_000],
    ["500ms", 500],
    ["PT15M", 15 * 60_000],
    ["PT1H30M", 90 * 60_000],
    ["P1D", 86_400_000],
  ])("reads %s", (text, expected) => {
    expect(Duration.parse(text).milliseconds).toBe(expected);
  });

  it.each(["", "15x", "0min", "PT", "P", "fifteen minutes", "constructor", "toString", "__proto__", "hasOwnProperty"])(
    "rejects %j",
    (text) => {
      expect(() => Duration.parse(text)).toThrow(InvalidRequestError);
    },
  );

  it("returns null from tryParse where parse throws", () => {
    expect(Duration.tryParse("constructor")).toBeNull();
    expect(Duration.tryParse("0min")).toBeNull();
    expect(Duration.tryParse(" 15T ")?.milliseconds).toBe(15 * 60_000);
  });

  it("formats back to the largest whole unit", () => {
    expect(Duration.parse("15T").toString()).toBe("15min");
    expect(Duration.parse("PT2H").toString()).toBe("2h");
    expect(Duration.parse("90s").toString()).toBe("90s");
  });

  it("counts steps rounding up", () => {
    expect(Duration.fromHours(3).stepsOf(Duration.fromMinutes(15))).toBe(12);
    expect(Duration.fromMinutes(50).stepsOf(Duration.fromMinutes(15))).toBe(4);
    expect(() => Duration.fromHours(1).stepsOf(Duration.zero())).toThrow(RangeError);
  });
});
