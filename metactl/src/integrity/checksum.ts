import { createHash } from "node:crypto";

const SHA1_HEX = /^[0-9a-f]{40}$/;

/** Compute the lowercase hex SHA-1 of a buffer. */
export function computeSha1(bytes: Uint8Array): string {
  return createHash("sha1").update(bytes).digest("hex");
}

/** Case-sensitive comparison of `expected` against the SHA-1 of `bytes`. */
export function verifyDigest(bytes: Uint8Array, expected: string): boolean {
  return computeSha1(bytes) === expected;
}

export function isSha1Hex(value: string): boolean {
  return SHA1_HEX.test(value);
}

/** Anything that can digest a buffer, on or off the main thread. */
export interface Hasher {
  digest(bytes: Uint8Array): Promise<string>;
}

/** Hashes on the calling thread. */
export const inlineHasher: Hasher = {
  digest: async (bytes) => computeSha1(bytes),
};
