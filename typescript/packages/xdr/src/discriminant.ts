// Discriminant tables for enums and unions.
//
// Enums map their wire ordinal straight to a declared value. Union arms are
// matched through an explicit selector table so a schema can assign
// arbitrary, non-positional selectors to its arms. Tables are built once
// per shape object and cached.

import { XdrError, XdrErrorCode } from "./errors.ts";
import type { EnumShape, EnumVariant, UnionArm, UnionDefaultArm, UnionShape } from "./schema.ts";

const U32_MAX = 0xffffffff;
const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;

// Same digits a u32 parser accepts: optional '+', then decimal digits
const NUMERIC_NAME = /^\+?[0-9]+$/;

// ============================================================================
// Enum table
// ============================================================================

export class EnumTable {
  private readonly byValue = new Map<number, EnumVariant>();
  private readonly byName = new Map<string, EnumVariant>();

  private constructor(readonly shape: EnumShape) {
    const label = shape.name ?? "enum";
    for (const variant of shape.variants) {
      if (!Number.isInteger(variant.value) || variant.value < I32_MIN || variant.value > I32_MAX) {
        throw new XdrError(
          XdrErrorCode.INCONSISTENT_TABLE,
          `${label}: variant ${variant.name} has value ${variant.value}, not a signed 32-bit integer`,
        );
      }
      const clash = this.byValue.get(variant.value);
      if (clash) {
        throw new XdrError(
          XdrErrorCode.INCONSISTENT_TABLE,
          `${label}: variants ${clash.name} and ${variant.name} share value ${variant.value}`,
        );
      }
      if (this.byName.has(variant.name)) {
        throw new XdrError(XdrErrorCode.INCONSISTENT_TABLE, `${label}: duplicate variant ${variant.name}`);
      }
      this.byValue.set(variant.value, variant);
      this.byName.set(variant.name, variant);
    }
  }

  static for(shape: EnumShape): EnumTable {
    let table = enumTables.get(shape);
    if (!table) {
      table = new EnumTable(shape);
      enumTables.set(shape, table);
    }
    return table;
  }

  /** Variant declared with `ordinal`, or undefined. */
  variantForOrdinal(ordinal: number): EnumVariant | undefined {
    return this.byValue.get(ordinal);
  }

  /** Variant declared as `name`, or undefined. */
  variantForName(name: string): EnumVariant | undefined {
    return this.byName.get(name);
  }

  /** Declared values, for error messages. */
  describe(): string {
    return this.shape.variants.map((v) => `${v.value}=${v.name}`).join(", ");
  }
}

const enumTables = new WeakMap<EnumShape, EnumTable>();

// ============================================================================
// Union discriminant table
// ============================================================================

/** Outcome of resolving a wire selector. */
export type ArmResolution =
  | { kind: "arm"; index: number; arm: UnionArm }
  | { kind: "default"; selector: number; arm: UnionDefaultArm };

/**
 * Parse an arm name as an unsigned 32-bit selector.
 *
 * @returns The selector, or undefined when the name is not numeric
 */
export function parseNumericName(name: string): number | undefined {
  if (!NUMERIC_NAME.test(name)) return undefined;
  const value = Number(name);
  if (!Number.isSafeInteger(value) || value > U32_MAX) return undefined;
  return value;
}

/**
 * Explicit mapping between wire selectors and a union's declared arms.
 *
 * Each arm's selector is its `discriminant` when given, otherwise its name
 * parsed as an integer. Decoding goes selector → arm position, encoding goes
 * arm name → selector.
 */
export class DiscriminantTable {
  private readonly armBySelector = new Map<number, number>();
  private readonly selectorByName = new Map<string, number>();
  private readonly indexByName = new Map<string, number>();

  private constructor(readonly shape: UnionShape) {
    const label = shape.name ?? "union";
    shape.arms.forEach((arm, index) => {
      const selector = arm.discriminant ?? parseNumericName(arm.name);
      if (selector === undefined) {
        throw new XdrError(
          XdrErrorCode.INCONSISTENT_TABLE,
          `${label}: arm ${arm.name} has no discriminant and its name is not a number`,
        );
      }
      if (!Number.isInteger(selector) || selector < 0 || selector > U32_MAX) {
        throw new XdrError(
          XdrErrorCode.INCONSISTENT_TABLE,
          `${label}: arm ${arm.name} selector ${selector} is not an unsigned 32-bit integer`,
        );
      }
      const clash = this.armBySelector.get(selector);
      if (clash !== undefined) {
        throw new XdrError(
          XdrErrorCode.INCONSISTENT_TABLE,
          `${label}: arms ${shape.arms[clash].name} and ${arm.name} share selector ${selector}`,
        );
      }
      if (this.indexByName.has(arm.name)) {
        throw new XdrError(XdrErrorCode.INCONSISTENT_TABLE, `${label}: duplicate arm ${arm.name}`);
      }
      this.armBySelector.set(selector, index);
      this.selectorByName.set(arm.name, selector);
      this.indexByName.set(arm.name, index);
    });

    if (shape.default && this.indexByName.has(shape.default.name)) {
      throw new XdrError(
        XdrErrorCode.INCONSISTENT_TABLE,
        `${label}: default arm ${shape.default.name} clashes with a declared arm`,
      );
    }
  }

  static for(shape: UnionShape): DiscriminantTable {
    let table = unionTables.get(shape);
    if (!table) {
      table = new DiscriminantTable(shape);
      unionTables.set(shape, table);
    }
    return table;
  }

  /**
   * Resolve a selector read from the wire (decode direction).
   *
   * @throws XdrError BAD_UNION_INDEX when no arm claims the selector and the
   *   union has no default arm
   */
  resolve(selector: number): ArmResolution {
    const index = this.armBySelector.get(selector);
    if (index !== undefined) {
      return { kind: "arm", index, arm: this.shape.arms[index] };
    }
    if (this.shape.default) {
      return { kind: "default", selector, arm: this.shape.default };
    }
    const label = this.shape.name ? `union ${this.shape.name}` : "union";
    throw new XdrError(
      XdrErrorCode.BAD_UNION_INDEX,
      `bad index for ${label}: selector ${selector} matches no arm (known: ${this.describe()})`,
    );
  }

  /**
   * Selector to write for a value (encode direction).
   *
   * @param tag - Arm name
   * @param selector - Explicit selector, required for the default arm
   */
  selectorFor(tag: string, selector?: number): number {
    const declared = this.selectorByName.get(tag);
    if (declared !== undefined) return declared;

    const fallback = this.shape.default;
    if (fallback && fallback.name === tag) {
      if (selector === undefined || !Number.isInteger(selector) || selector < 0 || selector > U32_MAX) {
        throw new XdrError(
          XdrErrorCode.TYPE_MISMATCH,
          `default arm ${tag} needs an unsigned 32-bit selector`,
        );
      }
      if (this.armBySelector.has(selector)) {
        throw new XdrError(
          XdrErrorCode.BAD_UNION_INDEX,
          `selector ${selector} belongs to a declared arm, not the default arm ${tag}`,
        );
      }
      return selector;
    }

    throw new XdrError(XdrErrorCode.BAD_UNION_INDEX, `unknown union arm: ${tag} (known: ${this.describe()})`);
  }

  /** Position of the arm named `tag` in the declared list, or undefined. */
  indexOf(tag: string): number | undefined {
    return this.indexByName.get(tag);
  }

  describe(): string {
    return [...this.armBySelector].map(([selector, index]) => `${selector}=${this.shape.arms[index].name}`).join(", ");
  }
}

const unionTables = new WeakMap<UnionShape, DiscriminantTable>();
