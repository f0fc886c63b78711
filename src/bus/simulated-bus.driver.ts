import { Logger } from '@nestjs/common';
import { formatHex } from '../common/utils/hex';
import {
  GPIOA,
  GPIOB,
  IODIRA,
  IODIRB,
} from '../register/register.constants';
import { BusDriver } from './bus-driver.interface';
import { BusError } from './bus.errors';

const REGISTER_COUNT = 0x16;

interface SimulatedChip {
  registers: Uint8Array;
  inputLevels: [number, number];
}

export interface SimulatedBusOptions {
  boards: readonly number[];
  latencyMs?: number;
}

/**
 * In-memory MCP23017 stand-in. Reading GPIOx returns the output latch for
 * output pins and the externally applied level for input pins, like the chip.
 */
export class SimulatedBusDriver implements BusDriver {
  private readonly logger = new Logger(SimulatedBusDriver.name);
  private readonly chips = new Map<number, SimulatedChip>();
  private readonly latencyMs: number;

  constructor(options: SimulatedBusOptions) {
    this.latencyMs = options.latencyMs ?? 0;
    for (const board of options.boards) {
      this.attach(board);
    }
  }

  attach(boardAddress: number): void {
    const registers = new Uint8Array(REGISTER_COUNT);
    // power-on state: every pin is an input
    registers[IODIRA] = 0xff;
    registers[IODIRB] = 0xff;
    this.chips.set(boardAddress, { registers, inputLevels: [0, 0] });
  }

  detach(boardAddress: number): void {
    this.chips.delete(boardAddress);
  }

  setInputLevels(boardAddress: number, half: 0 | 1, levels: number): void {
    this.chip(boardAddress).inputLevels[half] = levels & 0xff;
  }

  async readRegister(boardAddress: number, register: number): Promise<number> {
    await this.settle();
    const chip = this.chip(boardAddress, register);
    if (register === GPIOA || register === GPIOB) {
      const half = register === GPIOA ? 0 : 1;
      const direction = chip.registers[half === 0 ? IODIRA : IODIRB];
      return (
        (chip.registers[register] & ~direction & 0xff) |
        (chip.inputLevels[half] & direction)
      );
    }
    return chip.registers[register];
  }

  async writeRegister(
    boardAddress: number,
    register: number,
    value: number,
  ): Promise<void> {
    await this.settle();
    const chip = this.chip(boardAddress, register);
    this.logger.verbose(
      `write ${formatHex(value)} to ${formatHex(register)} on ${formatHex(boardAddress)}`,
    );
    chip.registers[register] = value & 0xff;
  }

  private chip(boardAddress: number, register?: number): SimulatedChip {
    const chip = this.chips.get(boardAddress);
    if (!chip) {
      throw new BusError(
        `No acknowledge from board ${formatHex(boardAddress)}`,
        boardAddress,
        register,
      );
    }
    if (register !== undefined && (register < 0 || register >= REGISTER_COUNT)) {
      throw new BusError(
        `Register ${formatHex(register)} does not exist`,
        boardAddress,
        register,
      );
    }
    return chip;
  }

  private async settle(): Promise<void> {
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }
  }
}
