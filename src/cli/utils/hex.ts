/**
 * Hex text to bytes and back.
 */

const HEX_PAIR = /^[0-9a-f]{2}$/i;

/**
 * Parses hex text. Whitespace, `:` and `,` separators and a leading `0x`
 * are ignored.
 *
 * @throws Error for odd-length input or non-hex characters
 */
export function parseHex(text: string): Uint8Array {
  const digits = text.trim().replace(/^0x/i, "").replace(/[\s:,]/g, "");
  if (digits.length % 2 !== 0) {
    throw new Error(`Hex input has an odd number of digits (${digits.length})`);
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const pair = digits.slice(i * 2, i * 2 + 2);
    if (!HEX_PAIR.test(pair)) {
      throw new Error(`Invalid hex digits '${pair}' at byte ${i}`);
    }
    bytes[i] = parseInt(pair, 16);
  }
  return bytes;
}

/**
 * Formats bytes as lowercase hex pairs separated by spaces.
 */
export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}
