import { describe, expect, it } from "vitest";
import { parseSizeInput, SIZE_PRESETS, validateDimensions } from "../src";

describe("parseSizeInput", () => {
  it("expands presets", () => {
    expect(parseSizeInput("xs").value).toEqual({ width: 9, height: 9 });
    expect(parseSizeInput(" M ").value).toEqual({ width: 21, height: 11 });
    expect(parseSizeInput("xl").value).toEqual({ width: 41, height: 31 });
  });

  it("keeps every preset within the limits", () => {
    for (const [width, height] of Object.values(SIZE_PRESETS)) {
      expect(validateDimensions(width, height).isOk()).toBe(true);
    }
  });

  it("parses custom dimensions", () => {
    expect(parseSizeInput("21 11").value).toEqual({ width: 21, height: 11 });
    expect(parseSizeInput("8   6").value).toEqual({ width: 8, height: 6 });
  });

  it("rejects empty input", () => {
    const res = parseSizeInput("  ");
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.message).toBe("Input cannot be empty");
  });

  it("rejects malformed input", () => {
    expect(parseSizeInput("21").error.message).toBe(
      "Custom dimensions must be in format 'width height' (e.g., '21 11')",
    );
    expect(parseSizeInput("1 2 3").error.code).toBe("CONFIG_INVALID");
    expect(parseSizeInput("ten 5").error.message).toBe(
      "Width and height must be integers",
    );
    expect(parseSizeInput("huge").error.code).toBe("CONFIG_INVALID");
  });

  it("enforces dimension limits", () => {
    const small = parseSizeInput("2 10");
    expect(small.error.code).toBe("CONFIG_DIMENSION_TOO_SMALL");
    expect(small.error.message).toBe("Maze dimensions must be at least 3x3");

    const large = parseSizeInput("201 10");
    expect(large.error.code).toBe("CONFIG_DIMENSION_TOO_LARGE");
    expect(large.error.message).toBe("Maze dimensions cannot exceed 200x200");

    expect(parseSizeInput("-5 10").error.code).toBe("CONFIG_DIMENSION_TOO_SMALL");
  });
});

describe("validateDimensions", () => {
  it("accepts the bounds themselves", () => {
    expect(validateDimensions(3, 3).value).toEqual({ width: 3, height: 3 });
    expect(validateDimensions(200, 200).value).toEqual({ width: 200, height: 200 });
  });

  it("rejects fractional sizes", () => {
    expect(validateDimensions(10.5, 10).error.code).toBe("CONFIG_INVALID");
  });
});
