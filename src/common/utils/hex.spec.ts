import { formatHex, parseHex } from './hex';

describe('hex helpers', () => {
  it('formats bytes as upper-case, zero padded hex', () => {
    expect(formatHex(5)).toBe('0x05');
    expect(formatHex(0xab)).toBe('0xAB');
    expect(formatHex(0x20, 4)).toBe('0x0020');
  });

  it('parses hex with or without prefix', () => {
    expect(parseHex('0x20')).toBe(0x20);
    expect(parseHex('0X2f')).toBe(0x2f);
    expect(parseHex('a')).toBe(10);
  });

  it('rejects anything else', () => {
    expect(parseHex('')).toBeNull();
    expect(parseHex('0x')).toBeNull();
    expect(parseHex('12g')).toBeNull();
    expect(parseHex('-1')).toBeNull();
  });
});
