import { loadBrokerConfig } from './broker.config';

describe('loadBrokerConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadBrokerConfig({});

    expect(config.commandTtlMs).toBe(1500);
    expect(config.resultTtlMs).toBe(5000);
    expect(config.queueBackend).toBe('redis');
    expect(config.simulatedBoards).toEqual([0x20]);
    expect(config.tcpPort).toBe(8888);
  });

  it('coerces numeric variables and parses hex board lists', () => {
    const config = loadBrokerConfig({
      COMMAND_TTL_MS: '800',
      QUEUE_BACKEND: 'memory',
      SIMULATED_BOARDS: '0x20, 21,0x27',
      TCP_PORT: '0',
    });

    expect(config.commandTtlMs).toBe(800);
    expect(config.queueBackend).toBe('memory');
    expect(config.simulatedBoards).toEqual([0x20, 0x21, 0x27]);
    expect(config.tcpPort).toBe(0);
  });

  it('rejects an unknown queue backend', () => {
    expect(() => loadBrokerConfig({ QUEUE_BACKEND: 'sqlite' })).toThrow();
  });

  it('rejects malformed board lists', () => {
    expect(() => loadBrokerConfig({ SIMULATED_BOARDS: '0x20,zz' })).toThrow();
  });
});
