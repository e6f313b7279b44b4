// Tests for enum and union discriminant tables

import { describe, it, expect } from "vitest";
import { DiscriminantTable, EnumTable, parseNumericName } from "./discriminant.ts";
import { defineEnum } from "./enum.ts";
import { XdrError, XdrErrorCode } from "./errors.ts";
import type { EnumShape, UnionShape } from "./schema.ts";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof XdrError) return e.code;
    throw e;
  }
  return undefined;
}

// ============================================================================
// Numeric names
// ============================================================================

describe("parseNumericName", () => {
  it("parses unsigned decimal names", () => {
    expect(parseNumericName("0")).toBe(0);
    expect(parseNumericName("7")).toBe(7);
    expect(parseNumericName("+7")).toBe(7);
    expect(parseNumericName("007")).toBe(7);
    expect(parseNumericName("4294967295")).toBe(4294967295);
  });

  it("rejects everything else", () => {
    expect(parseNumericName("")).toBeUndefined();
    expect(parseNumericName("-1")).toBeUndefined();
    expect(parseNumericName("Ok")).toBeUndefined();
    expect(parseNumericName("1.5")).toBeUndefined();
    expect(parseNumericName(" 1")).toBeUndefined();
    expect(parseNumericName("4294967296")).toBeUndefined();
  });
});

// ============================================================================
// Union tables
// ============================================================================

describe("DiscriminantTable", () => {
  const numericNames: UnionShape = {
    kind: "union",
    name: "Reply",
    arms: [{ name: "10" }, { name: "20", payload: { kind: "u32" } }, { name: "30" }],
  };

  it("matches the wire selector against parsed arm names", () => {
    const table = DiscriminantTable.for(numericNames);
    const resolved = table.resolve(20);

    expect(resolved.kind).toBe("arm");
    expect(resolved.arm.name).toBe("20");
    if (resolved.kind === "arm") expect(resolved.index).toBe(1);
  });

  it("does not treat the selector as a position", () => {
    const table = DiscriminantTable.for(numericNames);

    expect(codeOf(() => table.resolve(1))).toBe(XdrErrorCode.BAD_UNION_INDEX);
    expect(codeOf(() => table.resolve(0))).toBe(XdrErrorCode.BAD_UNION_INDEX);
  });

  it("names the union and the known selectors in the error", () => {
    expect(() => DiscriminantTable.for(numericNames).resolve(4)).toThrow(
      "bad index for union Reply: selector 4 matches no arm (known: 10=10, 20=20, 30=30)",
    );
  });

  it("maps arm names back to selectors", () => {
    const table = DiscriminantTable.for(numericNames);

    expect(table.selectorFor("10")).toBe(10);
    expect(table.selectorFor("30")).toBe(30);
    expect(table.indexOf("30")).toBe(2);
    expect(codeOf(() => table.selectorFor("40"))).toBe(XdrErrorCode.BAD_UNION_INDEX);
  });

  it("prefers an explicit discriminant over the name", () => {
    const shape: UnionShape = {
      kind: "union",
      arms: [
        { name: "5", discriminant: 9 },
        { name: "Err", discriminant: 2 },
      ],
    };
    const table = DiscriminantTable.for(shape);

    expect(table.resolve(9).arm.name).toBe("5");
    expect(table.resolve(2).arm.name).toBe("Err");
    expect(codeOf(() => table.resolve(5))).toBe(XdrErrorCode.BAD_UNION_INDEX);
    expect(table.selectorFor("5")).toBe(9);
  });

  it("is built once per shape", () => {
    expect(DiscriminantTable.for(numericNames)).toBe(DiscriminantTable.for(numericNames));
  });

  it("rejects an arm with neither discriminant nor numeric name", () => {
    const shape: UnionShape = { kind: "union", arms: [{ name: "1" }, { name: "Two" }] };
    expect(codeOf(() => DiscriminantTable.for(shape))).toBe(XdrErrorCode.INCONSISTENT_TABLE);
  });

  it("rejects duplicate selectors", () => {
    const shape: UnionShape = {
      kind: "union",
      arms: [{ name: "3" }, { name: "Three", discriminant: 3 }],
    };
    expect(() => DiscriminantTable.for(shape)).toThrow("union: arms 3 and Three share selector 3");
  });

  it("rejects selectors outside u32", () => {
    const shape: UnionShape = { kind: "union", arms: [{ name: "Neg", discriminant: -1 }] };
    expect(codeOf(() => DiscriminantTable.for(shape))).toBe(XdrErrorCode.INCONSISTENT_TABLE);
  });

  it("rejects a default arm named like a declared arm", () => {
    const shape: UnionShape = {
      kind: "union",
      arms: [{ name: "0" }],
      default: { name: "0" },
    };
    expect(codeOf(() => DiscriminantTable.for(shape))).toBe(XdrErrorCode.INCONSISTENT_TABLE);
  });

  describe("default arm", () => {
    const withDefault: UnionShape = {
      kind: "union",
      arms: [{ name: "Ok", discriminant: 0 }],
      default: { name: "Other", payload: { kind: "u8" } },
    };

    it("takes unclaimed selectors", () => {
      expect(DiscriminantTable.for(withDefault).resolve(99)).toEqual({
        kind: "default",
        selector: 99,
        arm: withDefault.default,
      });
    });

    it("needs an explicit selector to encode", () => {
      const table = DiscriminantTable.for(withDefault);

      expect(table.selectorFor("Other", 99)).toBe(99);
      expect(codeOf(() => table.selectorFor("Other"))).toBe(XdrErrorCode.TYPE_MISMATCH);
      expect(codeOf(() => table.selectorFor("Other", 0))).toBe(XdrErrorCode.BAD_UNION_INDEX);
    });
  });
});

// ============================================================================
// Enum tables
// ============================================================================

describe("EnumTable", () => {
  const Status: EnumShape = {
    kind: "enum",
    name: "Status",
    variants: [
      { name: "OK", value: 0 },
      { name: "NOENT", value: 2 },
      { name: "STALE", value: -70 },
    ],
  };

  it("maps declared values, not positions", () => {
    const table = EnumTable.for(Status);

    expect(table.variantForOrdinal(2)?.name).toBe("NOENT");
    expect(table.variantForOrdinal(-70)?.name).toBe("STALE");
    expect(table.variantForOrdinal(1)).toBeUndefined();
    expect(table.variantForName("STALE")?.value).toBe(-70);
  });

  it("rejects shared values", () => {
    const shape: EnumShape = {
      kind: "enum",
      name: "Dup",
      variants: [
        { name: "A", value: 1 },
        { name: "B", value: 1 },
      ],
    };
    expect(() => EnumTable.for(shape)).toThrow("Dup: variants A and B share value 1");
  });

  it("rejects values outside i32", () => {
    const shape: EnumShape = { kind: "enum", variants: [{ name: "Big", value: 2 ** 31 }] };
    expect(codeOf(() => EnumTable.for(shape))).toBe(XdrErrorCode.INCONSISTENT_TABLE);
  });
});

describe("defineEnum", () => {
  const Color = { RED: 0, GREEN: 1, BLUE: 5 } as const;

  it("builds variants in table order", () => {
    expect(defineEnum("Color", Color)).toEqual({
      kind: "enum",
      name: "Color",
      variants: [
        { name: "RED", value: 0 },
        { name: "GREEN", value: 1 },
        { name: "BLUE", value: 5 },
      ],
    });
  });

  it("fails where a bad table is declared", () => {
    expect(codeOf(() => defineEnum("Bad", { A: 1, B: 1 }))).toBe(XdrErrorCode.INCONSISTENT_TABLE);
  });
});
