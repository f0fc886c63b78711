import { BusDriver } from './bus-driver.interface';
import { BusBusyError, BusDeadlineError } from './bus.errors';

/**
 * Races every transaction against a deadline. A driver call cannot be
 * aborted, so one that loses the race keeps the bus held: until it settles,
 * further transactions are refused with BusBusyError and never reach the
 * driver.
 */
export class BoundedBus implements BusDriver {
  private busy = false;

  constructor(
    private readonly driver: BusDriver,
    private readonly deadlineMs: number,
  ) {}

  readRegister(boardAddress: number, register: number): Promise<number> {
    return this.transact(boardAddress, register, () =>
      this.driver.readRegister(boardAddress, register),
    );
  }

  writeRegister(
    boardAddress: number,
    register: number,
    value: number,
  ): Promise<void> {
    return this.transact(boardAddress, register, () =>
      this.driver.writeRegister(boardAddress, register, value),
    );
  }

  private transact<T>(
    boardAddress: number,
    register: number,
    start: () => Promise<T>,
  ): Promise<T> {
    if (this.busy) {
      return Promise.reject(new BusBusyError(boardAddress, register));
    }

    this.busy = true;
    let transaction: Promise<T>;
    try {
      transaction = start();
    } catch (error) {
      this.busy = false;
      return Promise.reject(error);
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(
        () =>
          reject(new BusDeadlineError(boardAddress, register, this.deadlineMs)),
        this.deadlineMs,
      );
      // the bus is released only by the driver call itself, not by the deadline
      transaction.then(
        (value) => {
          this.busy = false;
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          this.busy = false;
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
