import { setTimeout as sleep } from 'timers/promises';
import { DirectionMemory } from '../board-config/interfaces/direction-memory.interface';
import { BusDriver } from '../bus/bus-driver.interface';
import { SimulatedBusDriver } from '../bus/simulated-bus.driver';
import { BrokerConfig, loadBrokerConfig } from '../config/broker.config';
import { CommandVerb } from '../queue/interfaces/command.interface';
import { FetchResult } from '../queue/interfaces/pending-result.interface';
import { MemoryCommandQueueStore } from '../queue/memory-command-queue.store';
import { IODIRA } from '../register/register.constants';
import { CommandExecutor } from './command-executor';
import { DispatcherService } from './dispatcher.service';

/** Counts overlapping transactions reaching the wrapped driver. */
class InstrumentedDriver implements BusDriver {
  inFlight = 0;
  maxInFlight = 0;
  transactions = 0;

  constructor(private readonly inner: BusDriver) {}

  readRegister(boardAddress: number, register: number): Promise<number> {
    return this.track(() => this.inner.readRegister(boardAddress, register));
  }

  writeRegister(boardAddress: number, register: number, value: number): Promise<void> {
    return this.track(() =>
      this.inner.writeRegister(boardAddress, register, value),
    );
  }

  private async track<T>(transaction: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.transactions++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await sleep(1);
      return await transaction();
    } finally {
      this.inFlight--;
    }
  }
}

/** Takes `delayMs` over its first transaction, then answers promptly. */
class SlowStartDriver implements BusDriver {
  private first = true;

  constructor(
    private readonly inner: BusDriver,
    private readonly delayMs: number,
  ) {}

  async readRegister(boardAddress: number, register: number): Promise<number> {
    await this.stall();
    return this.inner.readRegister(boardAddress, register);
  }

  async writeRegister(boardAddress: number, register: number, value: number): Promise<void> {
    await this.stall();
    return this.inner.writeRegister(boardAddress, register, value);
  }

  private async stall(): Promise<void> {
    if (this.first) {
      this.first = false;
      await sleep(this.delayMs);
    }
  }
}

async function waitForResult(
  store: MemoryCommandQueueStore,
  token: string,
  timeoutMs = 2000,
): Promise<FetchResult> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const fetched = await store.fetchResult(token);
    if (fetched.status !== 'notReady' || Date.now() >= deadline) {
      return fetched;
    }
    await sleep(2);
  }
}

describe('DispatcherService', () => {
  let config: BrokerConfig;
  let simulated: SimulatedBusDriver;
  let driver: InstrumentedDriver;
  let executor: CommandExecutor;

  beforeEach(() => {
    config = {
      ...loadBrokerConfig({}),
      idleWaitMs: 1,
      busDeadlineMs: 100,
      toggleDelayMs: 1,
    };
    simulated = new SimulatedBusDriver({ boards: [0x20] });
    driver = new InstrumentedDriver(simulated);
    executor = new CommandExecutor(driver, config);
  });

  describe('with a manual clock', () => {
    let clock: number;
    let store: MemoryCommandQueueStore;
    let dispatcher: DispatcherService;

    beforeEach(() => {
      clock = 0;
      store = new MemoryCommandQueueStore(
        { commandTtlMs: 1500, resultTtlMs: 5000, maxQueueLength: 64 },
        () => clock,
      );
      dispatcher = new DispatcherService(store, executor, config);
    });

    it('returns false when the queue is empty', async () => {
      await expect(dispatcher.processNext()).resolves.toBe(false);
      expect(driver.transactions).toBe(0);
    });

    it('never executes commands that expired while it was stalled', async () => {
      const tokens: string[] = [];
      for (let i = 0; i < 5; i++) {
        clock += 2;
        tokens.push(
          await store.enqueue(
            { verb: CommandVerb.CLRPIN, boardAddress: 0x20, pinIndex: 4 },
            1500,
          ),
        );
      }

      clock += 2000;

      await expect(dispatcher.processNext()).resolves.toBe(false);
      expect(driver.transactions).toBe(0);
      for (const token of tokens) {
        await expect(store.fetchResult(token)).resolves.toEqual({
          status: 'notReady',
        });
      }

      const fresh = await store.enqueue({
        verb: CommandVerb.IDENTIFY,
        boardAddress: 0x20,
      });
      await expect(dispatcher.processNext()).resolves.toBe(true);
      const fetched = await store.fetchResult(fresh);
      expect(fetched.status === 'ready' && fetched.result.value).toBe(1);
    });

    it('executes live commands in submission order', async () => {
      const execute = jest.spyOn(executor, 'execute');
      const submitted = [
        await store.enqueue({ verb: CommandVerb.CLRDBIT, boardAddress: 0x20, pinIndex: 1 }),
        await store.enqueue({ verb: CommandVerb.SETPIN, boardAddress: 0x20, pinIndex: 1 }),
        await store.enqueue({ verb: CommandVerb.GETPIN, boardAddress: 0x20, pinIndex: 1 }),
      ];

      while (await dispatcher.processNext()) {
        // drain
      }

      expect(execute.mock.calls.map(([command]) => command.token)).toEqual(
        submitted,
      );
      await expect(store.fetchResult(submitted[2])).resolves.toEqual({
        status: 'ready',
        result: {
          token: submitted[2],
          verb: CommandVerb.GETPIN,
          ok: true,
          value: 1,
          producedAt: expect.any(Number),
        },
      });
    });

    it('publishes failures as results', async () => {
      const invalid = await store.enqueue({
        verb: CommandVerb.SETPIN,
        boardAddress: 0x40,
        pinIndex: 1,
      });
      const absent = await store.enqueue({
        verb: CommandVerb.GETIOREG,
        boardAddress: 0x26,
        registerHalf: 0,
      });

      await dispatcher.processNext();
      await dispatcher.processNext();

      await expect(store.fetchResult(invalid)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: false, value: false, error: 'InvalidAddress' },
      });
      await expect(store.fetchResult(absent)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: false, value: -1, error: 'BusTransactionFailure' },
      });
    });
  });

  describe('overdue bus transactions', () => {
    it('never lets a late driver call overlap the next command', async () => {
      const slow = new InstrumentedDriver(new SlowStartDriver(simulated, 150));
      const store = new MemoryCommandQueueStore({
        commandTtlMs: 5000,
        resultTtlMs: 5000,
        maxQueueLength: 10,
      });
      const dispatcher = new DispatcherService(
        store,
        new CommandExecutor(slow, { ...config, busDeadlineMs: 20 }),
        config,
      );
      const first = await store.enqueue({ verb: CommandVerb.GETPIN, boardAddress: 0x20, pinIndex: 1 });
      const second = await store.enqueue({ verb: CommandVerb.GETPIN, boardAddress: 0x20, pinIndex: 1 });

      await dispatcher.processNext();
      await dispatcher.processNext();

      expect(slow.maxInFlight).toBe(1);
      expect(slow.transactions).toBe(1);
      await expect(store.fetchResult(first)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: false, value: -1, error: 'BusTransactionFailure' },
      });
      await expect(store.fetchResult(second)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: false, value: -1, error: 'BusTransactionFailure' },
      });

      await sleep(200);
      const third = await store.enqueue({ verb: CommandVerb.GETPIN, boardAddress: 0x20, pinIndex: 1 });
      await dispatcher.processNext();

      await expect(store.fetchResult(third)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: true, value: 0 },
      });
      expect(slow.maxInFlight).toBe(1);
    });
  });

  describe('running loop', () => {
    let store: MemoryCommandQueueStore;
    let dispatcher: DispatcherService;

    beforeEach(() => {
      store = new MemoryCommandQueueStore({
        commandTtlMs: 5000,
        resultTtlMs: 5000,
        maxQueueLength: 100,
      });
      dispatcher = new DispatcherService(store, executor, config);
    });

    afterEach(async () => {
      await dispatcher.stop();
    });

    it('keeps at most one bus transaction in flight under concurrent submission', async () => {
      await dispatcher.start();

      const clients = Array.from({ length: 12 }, (_, i) =>
        store
          .enqueue({
            verb: i % 2 === 0 ? CommandVerb.SETPIN : CommandVerb.GETPIN,
            boardAddress: 0x20,
            pinIndex: i % 16,
          })
          .then((token) => waitForResult(store, token)),
      );
      const results = await Promise.all(clients);

      expect(results.every((fetched) => fetched.status === 'ready')).toBe(true);
      expect(driver.transactions).toBeGreaterThan(12);
      expect(driver.maxInFlight).toBe(1);
    });

    it('survives a failing store and keeps serving', async () => {
      jest
        .spyOn(store, 'dequeueNext')
        .mockRejectedValueOnce(new Error('connection reset'));
      const token = await store.enqueue({
        verb: CommandVerb.IDENTIFY,
        boardAddress: 0x20,
      });

      await dispatcher.start();

      await expect(waitForResult(store, token)).resolves.toMatchObject({
        status: 'ready',
        result: { ok: true, value: 1 },
      });
      expect(dispatcher.isRunning).toBe(true);
    });

    it('refreshes its heartbeat while idle', async () => {
      await dispatcher.start();
      const first = dispatcher.heartbeat;

      await sleep(20);

      expect(dispatcher.heartbeat).toBeGreaterThan(first);
    });

    it('finishes the command in hand before stopping', async () => {
      const token = await store.enqueue({
        verb: CommandVerb.TOGGLE,
        boardAddress: 0x20,
        pinIndex: 2,
      });
      await dispatcher.start();
      await sleep(3);

      await dispatcher.stop();

      expect(dispatcher.isRunning).toBe(false);
      await expect(store.fetchResult(token)).resolves.toMatchObject({
        status: 'ready',
      });
    });
  });

  describe('direction memory', () => {
    it('restores remembered boards at start and forgets the missing ones', async () => {
      const memory: jest.Mocked<DirectionMemory> = {
        remember: jest.fn().mockResolvedValue(undefined),
        forget: jest.fn().mockResolvedValue(undefined),
        list: jest.fn().mockResolvedValue([
          { boardAddress: 0x20, directionA: 0x3c, directionB: 0xff },
          { boardAddress: 0x27, directionA: 0x00, directionB: 0x00 },
        ]),
      };
      const store = new MemoryCommandQueueStore({
        commandTtlMs: 1500,
        resultTtlMs: 5000,
        maxQueueLength: 8,
      });
      const dispatcher = new DispatcherService(store, executor, config, memory);

      await dispatcher.start();
      await dispatcher.stop();

      await expect(simulated.readRegister(0x20, IODIRA)).resolves.toBe(0x3c);
      expect(memory.forget).toHaveBeenCalledTimes(1);
      expect(memory.forget).toHaveBeenCalledWith(0x27);
    });
  });
});
