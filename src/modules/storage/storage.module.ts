import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { KeyValueStore } from './key-value.store';
import { MemoryKeyValueStore } from './memory-key-value.store';
import { RedisKeyValueStore } from './redis-key-value.store';
import { QuizKeys } from './quiz-keys';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';

export function createKeyValueStore(
  configService: ConfigService,
): KeyValueStore {
  const logger = new Logger('StorageModule');
  const driver = configService.get<string>(
    'STORAGE_DRIVER',
    QUIZ_CONFIG.STORAGE_DRIVERS.MEMORY,
  );

  switch (driver) {
    case QUIZ_CONFIG.STORAGE_DRIVERS.REDIS: {
      const redisUrl = configService.get<string>(
        'REDIS_URL',
        'redis://localhost:6379',
      );
      logger.log('Using Redis storage');
      return new RedisKeyValueStore(new Redis(redisUrl));
    }
    case QUIZ_CONFIG.STORAGE_DRIVERS.MEMORY:
      logger.warn('Using in-memory storage, state is lost on restart');
      return new MemoryKeyValueStore();
    default:
      throw new Error(`Unknown STORAGE_DRIVER: ${driver}`);
  }
}

@Global()
@Module({
  providers: [
    {
      provide: KeyValueStore,
      useFactory: createKeyValueStore,
      inject: [ConfigService],
    },
    {
      provide: QuizKeys,
      useFactory: (configService: ConfigService) =>
        new QuizKeys(
          configService.get<string>(
            'QUIZ_KEY_PREFIX',
            QUIZ_CONFIG.DEFAULT_KEY_PREFIX,
          ),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [KeyValueStore, QuizKeys],
})
export class StorageModule {}
