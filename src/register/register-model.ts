import {
  GPIOA,
  GPIOB,
  IODIRA,
  IODIRB,
  MAX_BOARD_ADDRESS,
  MIN_BOARD_ADDRESS,
  PIN_COUNT,
  PINS_PER_HALF,
} from './register.constants';

export type RegisterHalf = 0 | 1;

export type RegisterKind = 'direction' | 'state';

export interface PinLocation {
  half: RegisterHalf;
  bit: number;
}

export function isValidBoardAddress(address: number): boolean {
  return (
    Number.isInteger(address) &&
    address >= MIN_BOARD_ADDRESS &&
    address <= MAX_BOARD_ADDRESS
  );
}

export function isValidPinIndex(pin: number): boolean {
  return Number.isInteger(pin) && pin >= 0 && pin < PIN_COUNT;
}

export function isValidRegisterHalf(half: number): half is RegisterHalf {
  return half === 0 || half === 1;
}

/**
 * Maps a logical pin (0-15) onto its register half and bit position:
 * pins 0-7 live in half A, 8-15 in half B.
 */
export function locatePin(pin: number): PinLocation {
  return {
    half: pin < PINS_PER_HALF ? 0 : 1,
    bit: pin % PINS_PER_HALF,
  };
}

export function registerAddress(kind: RegisterKind, half: RegisterHalf): number {
  if (kind === 'direction') {
    return half === 0 ? IODIRA : IODIRB;
  }
  return half === 0 ? GPIOA : GPIOB;
}

export function setBit(byte: number, bit: number): number {
  return (byte | (1 << bit)) & 0xff;
}

export function clearBit(byte: number, bit: number): number {
  return byte & ~(1 << bit) & 0xff;
}

export function testBit(byte: number, bit: number): 0 | 1 {
  return (byte & (1 << bit)) === 0 ? 0 : 1;
}
