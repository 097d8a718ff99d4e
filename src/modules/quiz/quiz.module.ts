import { Module } from '@nestjs/common';
import { QuizController } from './quiz.controller';
import { QuizContractService } from './quiz-contract.service';
import { AccessControlModule } from '../access-control/access-control.module';
import { QuizStoreModule } from '../quiz-store/quiz-store.module';
import { HasherModule } from '../hasher/hasher.module';
import { CallerGuard } from '../../common/guards/caller.guard';

@Module({
  imports: [AccessControlModule, QuizStoreModule, HasherModule],
  providers: [QuizContractService, CallerGuard],
  controllers: [QuizController],
  exports: [QuizContractService],
})
export class QuizModule {}
