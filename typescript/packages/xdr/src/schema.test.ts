import { describe, it, expect } from "vitest";
import { XdrError, XdrErrorCode } from "./errors.ts";
import { describeShape, resolveShape, type Shape, type ShapeRegistry } from "./schema.ts";

describe("resolveShape", () => {
  const registry: ShapeRegistry = new Map<string, Shape>([
    ["Id", { kind: "u32" }],
    ["Alias", { kind: "ref", name: "Id" }],
  ]);

  it("returns non-ref shapes unchanged", () => {
    const shape: Shape = { kind: "bool" };
    expect(resolveShape(shape, registry)).toBe(shape);
  });

  it("follows a ref one level", () => {
    expect(resolveShape({ kind: "ref", name: "Id" }, registry)).toEqual({ kind: "u32" });
  });

  it("rejects missing names and refs to refs", () => {
    expect(() => resolveShape({ kind: "ref", name: "Nope" }, registry)).toThrow("unknown shape ref: Nope");
    expect(() => resolveShape({ kind: "ref", name: "Alias" }, registry)).toThrow(XdrError);
    try {
      resolveShape({ kind: "ref", name: "Alias" }, registry);
    } catch (e) {
      expect(e instanceof XdrError && e.code).toBe(XdrErrorCode.UNKNOWN_REF);
    }
  });
});

describe("describeShape", () => {
  it("names shapes compactly", () => {
    expect(describeShape({ kind: "u8" })).toBe("u8");
    expect(describeShape({ kind: "vec", element: { kind: "string" } })).toBe("vec<string>");
    expect(describeShape({ kind: "struct", fields: { a: { kind: "u8" }, b: { kind: "bool" } } })).toBe(
      "struct { a, b }",
    );
    expect(describeShape({ kind: "tuple", elements: [{ kind: "u8" }] })).toBe("tuple(1 elements)");
    expect(describeShape({ kind: "enum", variants: [{ name: "A", value: 0 }, { name: "B", value: 1 }] })).toBe(
      "enum { A | B }",
    );
    expect(describeShape({ kind: "union", name: "Reply", arms: [] })).toBe("Reply");
    expect(describeShape({ kind: "ref", name: "Tree" })).toBe("Tree");
  });
});
