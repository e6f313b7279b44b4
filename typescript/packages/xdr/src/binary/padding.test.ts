import { describe, it, expect } from "vitest";
import { framedLength, paddingFor, zeroPad } from "./padding.ts";

describe("paddingFor", () => {
  it("pads to the next multiple of 4 under rfc4506", () => {
    expect([0, 1, 2, 3, 4, 5, 8].map((n) => paddingFor(n, "rfc4506"))).toEqual([0, 3, 2, 1, 0, 3, 0]);
  });

  it("adds a full 4-byte pad to aligned lengths under legacy", () => {
    expect([0, 1, 2, 3, 4, 5, 8].map((n) => paddingFor(n, "legacy"))).toEqual([4, 3, 2, 1, 4, 3, 4]);
  });
});

describe("framedLength", () => {
  it("counts prefix, payload and padding", () => {
    expect(framedLength(4, "rfc4506")).toBe(8);
    expect(framedLength(4, "legacy")).toBe(12);
    expect(framedLength(5, "rfc4506")).toBe(12);
    expect(framedLength(0, "rfc4506")).toBe(4);
  });

  it("is always a multiple of 4", () => {
    for (let n = 0; n < 16; n++) {
      expect(framedLength(n, "rfc4506") % 4).toBe(0);
      expect(framedLength(n, "legacy") % 4).toBe(0);
    }
  });
});

describe("zeroPad", () => {
  it("returns the requested number of zero bytes", () => {
    expect(zeroPad(3)).toEqual(new Uint8Array([0, 0, 0]));
    expect(zeroPad(0).length).toBe(0);
  });
});
