import { RedisOperationResult, RedisError } from '@/types/redis.types';

/**
 * The subset of ioredis commands the service relies on. An ioredis `Redis`
 * instance (or ioredis-mock in tests) satisfies it.
 */
export interface RedisConnection {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<string | null>;
}

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export class RedisClient {
  constructor(private readonly client: RedisConnection) {}

  /**
   * SET key value EX ttl NX. `data` is true when this call created the key.
   */
  async setIfAbsent<T>(key: string, value: T, ttl: number): Promise<RedisOperationResult<boolean>> {
    try {
      const result = await this.client.set(key, JSON.stringify(value), 'EX', ttl, 'NX');
      return { success: true, data: result === 'OK' };
    } catch (e) {
      const error: RedisError = { code: 'SET_FAILED', message: errorMessage(e) };
      return { success: false, error };
    }
  }

  async get<T>(key: string, isValue: (value: unknown) => value is T): Promise<RedisOperationResult<T | null>> {
    try {
      const value = await this.client.get(key);
      if (value === null) {
        return { success: true, data: null };
      }
      const parsedValue: unknown = JSON.parse(value);
      if (!isValue(parsedValue)) {
        const error: RedisError = { code: 'INVALID_VALUE', message: `Unexpected value stored at ${key}` };
        return { success: false, error };
      }
      return { success: true, data: parsedValue };
    } catch (e) {
      const error: RedisError = { code: 'GET_FAILED', message: errorMessage(e) };
      return { success: false, error };
    }
  }
}
