import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { StorageModule } from './modules/storage/storage.module';
import { QuizModule } from './modules/quiz/quiz.module';
import { RateLimitModule } from './modules/rate-limit/rate-limit.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    StorageModule,
    QuizModule,
    RateLimitModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
