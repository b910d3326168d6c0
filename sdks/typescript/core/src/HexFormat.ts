/**
 * Hex helpers for diagnostics and test vectors.
 */

/**
 * Formats bytes as contiguous lowercase hex (e.g. `aabb01`).
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Parses a hex string into bytes. Whitespace and `:` separators are ignored.
 * @throws Error if the string has an odd digit count or a non-hex character
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/[\s:]/g, '');

  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Formats a single byte as `0x` followed by two hex digits.
 */
export function toHexByte(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}
