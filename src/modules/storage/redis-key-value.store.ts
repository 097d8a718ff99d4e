import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { KeyValueStore } from './key-value.store';

@Injectable()
export class RedisKeyValueStore
  extends KeyValueStore
  implements OnModuleDestroy
{
  private readonly logger = new Logger(RedisKeyValueStore.name);

  constructor(public readonly client: Redis) {
    super();
    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });
  }

  async get(key: string): Promise<string | null> {
    return await this.client.get(key);
  }

  async getMany(keys: string[]): Promise<(string | null)[]> {
    if (keys.length === 0) return [];
    return await this.client.mget(...keys);
  }

  async commit(entries: Record<string, string>): Promise<void> {
    const pairs = Object.entries(entries);
    if (pairs.length === 0) return;

    const transaction = this.client.multi();
    for (const [key, value] of pairs) {
      transaction.set(key, value);
    }

    const results = await transaction.exec();
    if (!results) {
      throw new Error('Redis transaction was discarded');
    }

    for (const [error] of results) {
      if (error) throw error;
    }
  }

  // Connection health check
  async ping(): Promise<string> {
    return await this.client.ping();
  }

  onModuleDestroy() {
    this.client.disconnect();
  }
}
