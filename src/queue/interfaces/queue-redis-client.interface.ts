export const REDIS_CLIENT = 'REDIS_CLIENT';

/** The Redis commands the queue store relies on. */
export interface QueueRedisClient {
  set(key: string, value: string, ttlMs: number): Promise<unknown>;
  getDel(key: string): Promise<string | null>;
  exists(key: string): Promise<number>;
  rPush(key: string, element: string): Promise<number>;
  lPop(key: string): Promise<string | null>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;
  lRem(key: string, count: number, element: string): Promise<number>;
  lLen(key: string): Promise<number>;
  quit(): Promise<unknown>;
}
