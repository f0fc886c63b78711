import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { brokerConfig, loadBrokerConfig } from '../config/broker.config';
import { CommandQueueStore } from '../queue/command-queue.store';
import { DispatcherService } from './dispatcher.service';
import { WatchdogService } from './watchdog.service';

describe('WatchdogService', () => {
  let watchdog: WatchdogService;
  let errorSpy: jest.SpyInstance;
  const dispatcher = { isRunning: true, heartbeat: 1000 };
  const store = { size: jest.fn() };

  beforeEach(async () => {
    dispatcher.isRunning = true;
    dispatcher.heartbeat = 1000;
    store.size.mockReset().mockResolvedValue(0);
    errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);

    const module = await Test.createTestingModule({
      providers: [
        WatchdogService,
        { provide: DispatcherService, useValue: dispatcher },
        { provide: CommandQueueStore, useValue: store },
        {
          provide: brokerConfig.KEY,
          useValue: { ...loadBrokerConfig({}), watchdogTimeoutMs: 5000 },
        },
      ],
    }).compile();

    watchdog = module.get(WatchdogService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stays quiet while the heartbeat is fresh', async () => {
    await watchdog.check(6000);

    expect(watchdog.isStalled).toBe(false);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('raises one alarm for a stalled dispatcher', async () => {
    await watchdog.check(6001);
    await watchdog.check(7000);

    expect(watchdog.isStalled).toBe(true);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Dispatcher has not turned for 5001 ms');
  });

  it('clears the alarm once the dispatcher turns again', async () => {
    await watchdog.check(7000);
    dispatcher.heartbeat = 7000;
    await watchdog.check(7100);

    expect(watchdog.isStalled).toBe(false);
  });

  it('ignores a stopped dispatcher', async () => {
    dispatcher.isRunning = false;
    await watchdog.check(60000);

    expect(watchdog.isStalled).toBe(false);
    expect(store.size).not.toHaveBeenCalled();
  });
});
