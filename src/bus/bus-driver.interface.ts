export const BUS_DRIVER = 'BUS_DRIVER';

/**
 * Byte-level access to the chips on the bus. Implementations reject with
 * `BusError` when a device does not acknowledge.
 */
export interface BusDriver {
  readRegister(boardAddress: number, register: number): Promise<number>;
  writeRegister(
    boardAddress: number,
    register: number,
    value: number,
  ): Promise<void>;
}
