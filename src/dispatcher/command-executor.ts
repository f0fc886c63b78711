import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  BoardDirections,
  DIRECTION_MEMORY,
  DirectionMemory,
} from '../board-config/interfaces/direction-memory.interface';
import { BoundedBus } from '../bus/bounded-bus';
import { BUS_DRIVER, BusDriver } from '../bus/bus-driver.interface';
import { BusBusyError } from '../bus/bus.errors';
import { describeError } from '../common/utils/describe-error';
import { formatHex } from '../common/utils/hex';
import { brokerConfig } from '../config/broker.config';
import {
  Command,
  CommandVerb,
  READ_VERBS,
  REGISTER_VERBS,
} from '../queue/interfaces/command.interface';
import {
  ExecutionError,
  ResultValue,
} from '../queue/interfaces/pending-result.interface';
import {
  clearBit,
  isValidBoardAddress,
  isValidPinIndex,
  isValidRegisterHalf,
  locatePin,
  RegisterHalf,
  registerAddress,
  setBit,
  testBit,
} from '../register/register-model';
import { IOCON, IOCON_INIT } from '../register/register.constants';

export interface ExecutionOutcome {
  ok: boolean;
  value: ResultValue;
  error?: ExecutionError;
}

type Target =
  | { kind: 'board' }
  | { kind: 'pin'; pin: number }
  | { kind: 'register'; half: RegisterHalf };

/**
 * Runs one command against the bus. Never throws: bus failures and bad
 * addresses come back as a failed outcome.
 */
@Injectable()
export class CommandExecutor {
  private readonly logger = new Logger(CommandExecutor.name);
  private readonly bus: BusDriver;
  private readonly managedBoards = new Set<number>();

  constructor(
    @Inject(BUS_DRIVER) driver: BusDriver,
    @Inject(brokerConfig.KEY)
    private readonly config: ConfigType<typeof brokerConfig>,
    @Optional()
    @Inject(DIRECTION_MEMORY)
    private readonly directionMemory?: DirectionMemory,
  ) {
    this.bus = new BoundedBus(driver, config.busDeadlineMs);
  }

  async execute(command: Command): Promise<ExecutionOutcome> {
    const { verb, boardAddress } = command;
    const target = this.resolveTarget(command);
    if (!target) {
      this.logger.warn(
        `Rejected ${verb} for board ${formatHex(boardAddress)}: address out of range`,
      );
      return { ok: false, value: this.failureValue(verb), error: 'InvalidAddress' };
    }

    try {
      const value = await this.run(verb, boardAddress, target);
      return { ok: true, value };
    } catch (error) {
      // a refused transaction never reached the board, so its state still holds
      const refused = error instanceof BusBusyError;
      if (!refused) {
        this.managedBoards.delete(boardAddress);
      }
      if (verb === CommandVerb.IDENTIFY) {
        this.logger.debug(`Board ${formatHex(boardAddress)} did not answer`);
        return { ok: true, value: 0 };
      }
      this.logger.error(
        `${verb} on board ${formatHex(boardAddress)} failed: ${describeError(error)}`,
      );
      if (!refused) {
        await this.forgetBoard(boardAddress);
      }
      return {
        ok: false,
        value: this.failureValue(verb),
        error: 'BusTransactionFailure',
      };
    }
  }

  /**
   * Writes both direction registers of a remembered board and reads them back.
   * Returns false when the board is gone or did not take the values.
   */
  async restoreDirections(board: BoardDirections): Promise<boolean> {
    const { boardAddress } = board;
    if (!isValidBoardAddress(boardAddress)) {
      return false;
    }
    try {
      await this.ensureManaged(boardAddress);
      const halves: Array<[RegisterHalf, number]> = [
        [0, board.directionA],
        [1, board.directionB],
      ];
      for (const [half, value] of halves) {
        const register = registerAddress('direction', half);
        await this.bus.writeRegister(boardAddress, register, value);
        if ((await this.bus.readRegister(boardAddress, register)) !== value) {
          return false;
        }
      }
      return true;
    } catch (error) {
      this.managedBoards.delete(boardAddress);
      this.logger.warn(
        `Could not restore board ${formatHex(boardAddress)}: ${describeError(error)}`,
      );
      return false;
    }
  }

  private resolveTarget(command: Command): Target | null {
    if (!isValidBoardAddress(command.boardAddress)) {
      return null;
    }
    if (command.verb === CommandVerb.IDENTIFY) {
      return { kind: 'board' };
    }
    if (REGISTER_VERBS.has(command.verb)) {
      const half = command.registerHalf;
      return half !== undefined && isValidRegisterHalf(half)
        ? { kind: 'register', half }
        : null;
    }
    const pin = command.pinIndex;
    return pin !== undefined && isValidPinIndex(pin) ? { kind: 'pin', pin } : null;
  }

  private failureValue(verb: CommandVerb): ResultValue {
    if (verb === CommandVerb.IDENTIFY) {
      return 0;
    }
    return READ_VERBS.has(verb) ? -1 : false;
  }

  private async run(
    verb: CommandVerb,
    board: number,
    target: Target,
  ): Promise<ResultValue> {
    await this.ensureManaged(board);

    if (target.kind === 'board') {
      await this.bus.readRegister(board, IOCON);
      return 1;
    }
    if (target.kind === 'register') {
      const kind = verb === CommandVerb.GETDIRREG ? 'direction' : 'state';
      return this.bus.readRegister(board, registerAddress(kind, target.half));
    }

    const { half, bit } = locatePin(target.pin);
    const direction = registerAddress('direction', half);
    const state = registerAddress('state', half);

    switch (verb) {
      case CommandVerb.GETDBIT:
        return testBit(await this.bus.readRegister(board, direction), bit);
      case CommandVerb.SETDBIT:
      case CommandVerb.CLRDBIT: {
        const current = await this.bus.readRegister(board, direction);
        const next =
          verb === CommandVerb.SETDBIT
            ? setBit(current, bit)
            : clearBit(current, bit);
        await this.bus.writeRegister(board, direction, next);
        await this.rememberDirection(board, half, next);
        return true;
      }
      case CommandVerb.GETPIN:
        return testBit(await this.bus.readRegister(board, state), bit);
      case CommandVerb.SETPIN:
      case CommandVerb.CLRPIN: {
        const current = await this.bus.readRegister(board, state);
        const next =
          verb === CommandVerb.SETPIN ? setBit(current, bit) : clearBit(current, bit);
        await this.bus.writeRegister(board, state, next);
        return true;
      }
      case CommandVerb.TOGGLE:
        await this.pulse(board, state, bit);
        return true;
      default:
        throw new Error(`Verb ${verb} does not address a pin`);
    }
  }

  // Drives the pin to the opposite level for toggleDelayMs, then restores it.
  private async pulse(board: number, register: number, bit: number): Promise<void> {
    const current = await this.bus.readRegister(board, register);
    const flipped = testBit(current, bit) ? clearBit(current, bit) : setBit(current, bit);
    await this.bus.writeRegister(board, register, flipped);
    await sleep(this.config.toggleDelayMs);
    const settled = await this.bus.readRegister(board, register);
    const restored = testBit(current, bit)
      ? setBit(settled, bit)
      : clearBit(settled, bit);
    await this.bus.writeRegister(board, register, restored);
  }

  private async ensureManaged(board: number): Promise<void> {
    if (this.managedBoards.has(board)) {
      return;
    }
    await this.bus.writeRegister(board, IOCON, IOCON_INIT);
    this.managedBoards.add(board);
    this.logger.log(`Initialised board ${formatHex(board)}`);
  }

  private async rememberDirection(
    board: number,
    half: RegisterHalf,
    value: number,
  ): Promise<void> {
    if (!this.directionMemory) {
      return;
    }
    try {
      await this.directionMemory.remember(board, half, value);
    } catch (error) {
      this.logger.warn(
        `Could not persist direction of board ${formatHex(board)}: ${describeError(error)}`,
      );
    }
  }

  private async forgetBoard(board: number): Promise<void> {
    if (!this.directionMemory) {
      return;
    }
    try {
      await this.directionMemory.forget(board);
    } catch (error) {
      this.logger.warn(
        `Could not forget board ${formatHex(board)}: ${describeError(error)}`,
      );
    }
  }
}
