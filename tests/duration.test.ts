import { describe, expect, it } from "vitest";
import { Duration } from "../src/schema/duration.js";
import { InvalidArgumentError } from "../src/errors.js";

describe("Duration", () => {
  it("holds minutes", () => {
    expect(Duration.create(90).toMinutes()).toBe(90);
    expect(Duration.create(0).toString()).toBe("0min");
  });

  it("adds and compares", () => {
    const total = Duration.create(10).add(Duration.create(25));

    expect(total.toMinutes()).toBe(35);
    expect(total.equals(Duration.create(35))).toBe(true);
    expect(total.isGreaterThan(Duration.create(30))).toBe(true);
    expect(total.equals(35)).toBe(false);
  });

  it("rejects negative and fractional minutes", () => {
    expect(() => Duration.create(-5)).toThrow(InvalidArgumentError);
    expect(() => Duration.create(1.5)).toThrow(
      "Duration must be a non-negative integer number of minutes (got 1.5)",
    );
  });
});
