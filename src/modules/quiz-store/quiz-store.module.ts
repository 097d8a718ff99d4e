import { Module } from '@nestjs/common';
import { QuizStoreService } from './quiz-store.service';
import { HasherModule } from '../hasher/hasher.module';
import { AccessControlModule } from '../access-control/access-control.module';

@Module({
  imports: [HasherModule, AccessControlModule],
  providers: [QuizStoreService],
  exports: [QuizStoreService],
})
export class QuizStoreModule {}
