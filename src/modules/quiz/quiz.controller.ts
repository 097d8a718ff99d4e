import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { QuizContractService } from './quiz-contract.service';
import { CallerGuard } from '../../common/guards/caller.guard';
import { Caller } from '../../common/decorators/caller.decorator';
import {
  AddQuestionDto,
  CheckAnswerDto,
  GrantEducatorDto,
} from '../../common/dto/quiz.dto';

// Reads are free; every mutating route is metered by the throttler.
@Controller('quiz')
export class QuizController {
  constructor(private readonly quizContract: QuizContractService) {}

  @Post('questions')
  @UseGuards(CallerGuard)
  async addQuestion(@Caller() caller: string, @Body() dto: AddQuestionDto) {
    const id = await this.quizContract.addQuestion(
      dto.text,
      dto.answer,
      caller,
    );
    return { id };
  }

  @Get('questions')
  @SkipThrottle()
  async listQuestions() {
    return this.quizContract.listQuestions();
  }

  @Get('questions/:id')
  @SkipThrottle()
  async getQuestion(@Param('id', ParseIntPipe) id: number) {
    return this.quizContract.getQuestion(id);
  }

  @Post('questions/:id/check')
  @HttpCode(HttpStatus.OK)
  @SkipThrottle()
  async checkAnswer(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CheckAnswerDto,
  ) {
    const correct = await this.quizContract.checkAnswer(id, dto.answer);
    return { correct };
  }

  @Post('users')
  @UseGuards(CallerGuard)
  async registerUser(@Caller() caller: string) {
    return this.quizContract.registerUser(caller);
  }

  @Post('educators')
  @UseGuards(CallerGuard)
  async grantEducator(
    @Caller() caller: string,
    @Body() dto: GrantEducatorDto,
  ) {
    return this.quizContract.grantEducator(dto.identity, caller);
  }

  @Get('roles/:identity')
  @SkipThrottle()
  async powerOf(@Param('identity') identity: string) {
    return this.quizContract.powerOf(identity);
  }
}
