import { EnumTable } from "./discriminant.ts";
import type { EnumShape } from "./schema.ts";

/**
 * Build an enum shape from a literal `{ NAME: value }` table.
 *
 * The table doubles as the TypeScript-side constant object, in the same
 * `as const` style as other code tables:
 *
 * @example
 * ```typescript
 * export const Color = { RED: 0, GREEN: 1, BLUE: 2 } as const;
 * export type Color = keyof typeof Color;
 * export const ColorShape = defineEnum("Color", Color);
 * ```
 *
 * @throws XdrError INCONSISTENT_TABLE for duplicate values or values
 *   outside the signed 32-bit range
 */
export function defineEnum(name: string, table: Readonly<Record<string, number>>): EnumShape {
  const shape: EnumShape = {
    kind: "enum",
    name,
    variants: Object.entries(table).map(([variant, value]) => ({ name: variant, value })),
  };
  // Validate eagerly so a bad table fails where it is declared
  EnumTable.for(shape);
  return shape;
}
