// MCP23017 register map (IOCON.BANK = 0)
export const IODIRA = 0x00;
export const IODIRB = 0x01;
export const IOCON = 0x0a;
export const GPIOA = 0x12;
export const GPIOB = 0x13;

// Sequential operation enabled, interrupt pins active-high
export const IOCON_INIT = 0x02;

export const MIN_BOARD_ADDRESS = 0x20;
export const MAX_BOARD_ADDRESS = 0x27;

export const PIN_COUNT = 16;
export const PINS_PER_HALF = 8;

export const BOARD_ADDRESSES: readonly number[] = Array.from(
  { length: MAX_BOARD_ADDRESS - MIN_BOARD_ADDRESS + 1 },
  (_, i) => MIN_BOARD_ADDRESS + i,
);
