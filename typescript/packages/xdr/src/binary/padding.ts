// Zero padding after text payloads.

/**
 * How many zero bytes follow a text payload.
 *
 * - `rfc4506`: pad to the next multiple of 4; aligned payloads get none.
 * - `legacy`: always `4 - len % 4`, so aligned payloads get a full 4-byte
 *   pad. Needed to exchange bytes with producers that pad this way.
 */
export type PaddingPolicy = "rfc4506" | "legacy";

export const PADDING_POLICIES: readonly PaddingPolicy[] = ["rfc4506", "legacy"];

export function paddingFor(length: number, policy: PaddingPolicy): number {
  const rest = length % 4;
  if (policy === "legacy") return 4 - rest;
  return rest === 0 ? 0 : 4 - rest;
}

/** Total bytes of a framed text value: u32 prefix, payload and padding. */
export function framedLength(length: number, policy: PaddingPolicy): number {
  return 4 + length + paddingFor(length, policy);
}

const ZEROS = new Uint8Array(4);

/** `count` zero bytes, `count` in 0..4. */
export function zeroPad(count: number): Uint8Array {
  return ZEROS.subarray(0, count);
}
