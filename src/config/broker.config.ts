import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const hexList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => parseInt(entry, 16)),
  )
  .refine((list) => list.every((value) => Number.isInteger(value)), {
    message: 'expected a comma separated list of hex addresses',
  });

export const brokerConfigSchema = z.object({
  commandTtlMs: z.coerce.number().int().positive().default(1500),
  resultTtlMs: z.coerce.number().int().positive().default(5000),
  pollIntervalMs: z.coerce.number().int().positive().default(20),
  idleWaitMs: z.coerce.number().int().positive().default(10),
  busDeadlineMs: z.coerce.number().int().positive().default(250),
  maxQueueLength: z.coerce.number().int().positive().default(256),
  toggleDelayMs: z.coerce.number().int().nonnegative().default(100),
  watchdogTimeoutMs: z.coerce.number().int().positive().default(5000),
  queueBackend: z.enum(['redis', 'memory']).default('redis'),
  redisHost: z.string().default('localhost'),
  redisPort: z.coerce.number().int().positive().default(6379),
  simulatedBoards: hexList.default('0x20'),
  tcpPort: z.coerce.number().int().nonnegative().default(8888),
});

export type BrokerConfig = z.infer<typeof brokerConfigSchema>;

export function loadBrokerConfig(env: NodeJS.ProcessEnv): BrokerConfig {
  return brokerConfigSchema.parse({
    commandTtlMs: env.COMMAND_TTL_MS,
    resultTtlMs: env.RESULT_TTL_MS,
    pollIntervalMs: env.POLL_INTERVAL_MS,
    idleWaitMs: env.IDLE_WAIT_MS,
    busDeadlineMs: env.BUS_DEADLINE_MS,
    maxQueueLength: env.MAX_QUEUE_LENGTH,
    toggleDelayMs: env.TOGGLE_DELAY_MS,
    watchdogTimeoutMs: env.WATCHDOG_TIMEOUT_MS,
    queueBackend: env.QUEUE_BACKEND,
    redisHost: env.REDIS_HOST,
    redisPort: env.REDIS_PORT,
    simulatedBoards: env.SIMULATED_BOARDS,
    tcpPort: env.TCP_PORT,
  });
}

export const brokerConfig = registerAs('broker', () =>
  loadBrokerConfig(process.env),
);
