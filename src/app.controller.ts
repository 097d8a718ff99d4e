import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { KeyValueStore } from './modules/storage/key-value.store';
import { QuizContractService } from './modules/quiz/quiz-contract.service';

@Controller()
@SkipThrottle()
export class AppController {
  constructor(
    private readonly store: KeyValueStore,
    private readonly quizContract: QuizContractService,
  ) {}

  @Get('/health')
  async healthCheck() {
    const storageOk = await this.store
      .ping()
      .then((reply) => reply === 'PONG')
      .catch(() => false);
    const ready = storageOk && this.quizContract.isInitialized();

    return {
      status: ready ? 'healthy' : 'degraded',
      storage: storageOk,
      initialized: this.quizContract.isInitialized(),
      uptime: process.uptime(),
    };
  }
}
