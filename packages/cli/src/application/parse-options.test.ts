import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { parsePositiveInteger } from "./parse-options.js";

describe("parsePositiveInteger", () => {
  it("accepts plain digits", () => {
    expect(parsePositiveInteger("3")).toBe(3);
    expect(parsePositiveInteger("16")).toBe(16);
  });

  it("rejects zero, signs and trailing garbage", () => {
    for (const value of ["0", "-2", "+4", "3abc", "2.5", "", "1e3"]) {
      expect(() => parsePositiveInteger(value)).toThrow(InvalidArgumentError);
    }
  });
});
