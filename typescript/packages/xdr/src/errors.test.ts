import { describe, it, expect } from "vitest";
import { XdrError, XdrErrorCode, ioError } from "./errors.ts";

describe("XdrError", () => {
  it("classifies codes by kind", () => {
    expect(XdrError.kindOf(XdrErrorCode.IO)).toBe("io");
    expect(XdrError.kindOf(XdrErrorCode.UNSUPPORTED_SHAPE)).toBe("unsupported");
    expect(XdrError.kindOf(XdrErrorCode.SELF_DESCRIBING)).toBe("unsupported");
    expect(XdrError.kindOf(XdrErrorCode.INVALID_BOOL)).toBe("domain");
    expect(XdrError.kindOf(XdrErrorCode.TRAILING_BYTES)).toBe("domain");
  });

  it("adds the location to the message once", () => {
    const error = new XdrError(XdrErrorCode.OUT_OF_RANGE, "u8: 300 is outside 0..255");
    const located = error.located("items[2]", 9);

    expect(error.message).toBe("u8: 300 is outside 0..255");
    expect(located.message).toBe("u8: 300 is outside 0..255 (at items[2], offset 9)");
    expect(located.detail).toBe(error.detail);
    expect(located.located("outer", 20)).toBe(located);
  });

  it("keeps the cause when relocated", () => {
    const cause = new Error("boom");
    const error = new XdrError(XdrErrorCode.IO, "read failed: boom", { cause });

    expect(error.located("<root>", 0).cause).toBe(cause);
    expect(error.name).toBe("XdrError");
    expect(error).toBeInstanceOf(Error);
  });
});

describe("ioError", () => {
  it("wraps foreign errors", () => {
    const error = ioError("read", new Error("EBADF"));

    expect(error.code).toBe(XdrErrorCode.IO);
    expect(error.message).toBe("read failed: EBADF");
  });

  it("wraps thrown non-errors", () => {
    expect(ioError("write", "nope").message).toBe("write failed: nope");
  });

  it("passes XdrErrors through", () => {
    const inner = new XdrError(XdrErrorCode.LENGTH_LIMIT, "too long");
    expect(ioError("read", inner)).toBe(inner);
  });
});
