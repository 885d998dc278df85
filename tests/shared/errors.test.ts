import { describe, expect, it } from "vitest";
import { ConversionError, errnoCode, isConversionError, toConversionError } from "../../src/shared/index.js";

describe("toConversionError", () => {
  it("passes conversion errors through unchanged", () => {
    const original = new ConversionError("NotFound", "gone");
    expect(toConversionError(original, "Internal")).toBe(original);
  });

  it("wraps anything else with the fallback kind", () => {
    const cause = new Error("boom");
    const wrapped = toConversionError(cause, "Internal");
    expect(isConversionError(wrapped)).toBe(true);
    expect(wrapped.kind).toBe("Internal");
    expect(wrapped.message).toBe("boom");
    expect(wrapped.cause).toBe(cause);
  });

  it("uses the given message when provided", () => {
    expect(toConversionError("text", "WriteFailed", "Could not write.").message).toBe("Could not write.");
  });
});

describe("errnoCode", () => {
  it("reads the code of filesystem errors", () => {
    const err = Object.assign(new Error("exists"), { code: "EEXIST" });
    expect(errnoCode(err)).toBe("EEXIST");
    expect(errnoCode(new Error("plain"))).toBeUndefined();
  });
});
