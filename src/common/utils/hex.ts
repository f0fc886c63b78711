export function formatHex(value: number, width: number = 2): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}

/**
 * Parses `0x1f`, `0X1F` or `1f`. Returns null for anything that is not a
 * plain hexadecimal number.
 */
export function parseHex(raw: string): number | null {
  const digits = raw.trim().replace(/^0x/i, '');
  if (!/^[0-9a-f]+$/i.test(digits)) {
    return null;
  }
  return parseInt(digits, 16);
}
