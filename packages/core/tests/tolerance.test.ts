import { describe, it, expect } from "vitest";
import { evaluateAllowedChanges, evaluateTolerance, formatPercent } from "../src/compare/tolerance.js";

describe("evaluateTolerance", () => {
  it("passes a change inside the tolerance", () => {
    expect(evaluateTolerance(100, 101, 1)).toEqual({
      status: "Success",
      deltaPercent: 1,
      message: "100 -> 101 (+1%)",
    });
  });

  it("fails a change outside the tolerance", () => {
    expect(evaluateTolerance(100, 102, 1)).toEqual({
      status: "Failed",
      deltaPercent: 2,
      message: "100 -> 102 (+2%)",
    });
  });

  it("measures decreases against the absolute old value", () => {
    const result = evaluateTolerance(-50, -55, 5);
    expect(result.status).toBe("Failed");
    expect(result.message).toBe("-50 -> -55 (-10%)");
  });

  it("passes identical values even with zero tolerance", () => {
    expect(evaluateTolerance(0, 0, 0)).toEqual({ status: "Success", deltaPercent: 0, message: "0 -> 0 (0%)" });
  });

  it("reports an error when the old value is zero and the new one differs", () => {
    expect(evaluateTolerance(0, 5, 10)).toEqual({
      status: "Error",
      message: "0 -> 5: relative change is undefined for an old value of 0",
    });
  });

  it("reports an error for non-finite input", () => {
    expect(evaluateTolerance(Number.NaN, 1, 10).status).toBe("Error");
  });
});

describe("evaluateAllowedChanges", () => {
  it("fails any change when changes are not allowed", () => {
    expect(evaluateAllowedChanges("a", "b", false)).toEqual({ status: "Failed", message: "a -> b" });
  });

  it("passes equal values when changes are not allowed", () => {
    expect(evaluateAllowedChanges(3, 3, false)).toEqual({ status: "Success", message: "3 -> 3" });
  });

  it("passes any change when changes are allowed", () => {
    expect(evaluateAllowedChanges(true, false, true)).toEqual({ status: "Success", message: "true -> false" });
  });
});

describe("formatPercent", () => {
  it("rounds to two decimals and signs positive values", () => {
    expect(formatPercent(1.23456)).toBe("+1.23%");
    expect(formatPercent(-0.5)).toBe("-0.5%");
    expect(formatPercent(0)).toBe("0%");
  });
});
