import { Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from '../storage/key-value.store';
import { QuizKeys } from '../storage/quiz-keys';
import { HasherService } from '../hasher/hasher.service';
import { AccessControlService } from '../access-control/access-control.service';
import {
  Question,
  QuestionSummary,
} from '../../common/interfaces/question.interface';
import { QuestionNotFoundError } from '../../common/errors/quiz.errors';

@Injectable()
export class QuizStoreService {
  private readonly logger = new Logger(QuizStoreService.name);

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: QuizKeys,
    private readonly hasher: HasherService,
    private readonly accessControl: AccessControlService,
  ) {}

  /**
   * Appends a question. Only the digest of `answer` is persisted; the
   * question and the advanced id counter are committed together.
   */
  async addQuestion(
    text: string,
    answer: string,
    requester: string,
  ): Promise<number> {
    await this.accessControl.requireEducator(requester, 'add questions');

    const id = await this.count();
    const question: Question = {
      id,
      text,
      answerHash: this.hasher.digest(answer),
    };

    await this.store.commit({
      [this.keys.question(id)]: JSON.stringify(question),
      [this.keys.nextQuestionId()]: String(id + 1),
    });

    this.logger.log(`Question ${id} added by ${requester}`);
    return id;
  }

  async checkAnswer(questionId: number, candidate: string): Promise<boolean> {
    const question = await this.getQuestion(questionId);
    return this.hasher.matches(candidate, question.answerHash);
  }

  async getQuestion(questionId: number): Promise<Question> {
    if (!Number.isSafeInteger(questionId) || questionId < 0) {
      throw new QuestionNotFoundError(questionId);
    }

    const data = await this.store.get(this.keys.question(questionId));
    if (!data) throw new QuestionNotFoundError(questionId);

    return this.parseQuestion(data);
  }

  async listQuestions(): Promise<QuestionSummary[]> {
    const total = await this.count();
    const ids = Array.from({ length: total }, (_, id) => id);
    const values = await this.store.getMany(
      ids.map((id) => this.keys.question(id)),
    );

    const questions: QuestionSummary[] = [];
    values.forEach((data, index) => {
      if (!data) {
        // Ids are allocated in the same commit as the question itself
        throw new Error(`Question ${index} is missing from storage`);
      }
      const { id, text } = this.parseQuestion(data);
      questions.push({ id, text });
    });

    return questions;
  }

  async count(): Promise<number> {
    const next = await this.store.get(this.keys.nextQuestionId());
    if (next === null) return 0;

    const value = Number(next);
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(`Corrupt question counter: ${next}`);
    }
    return value;
  }

  private parseQuestion(data: string): Question {
    const parsed: unknown = JSON.parse(data);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'id' in parsed &&
      'text' in parsed &&
      'answerHash' in parsed &&
      typeof parsed.id === 'number' &&
      typeof parsed.text === 'string' &&
      typeof parsed.answerHash === 'string'
    ) {
      return {
        id: parsed.id,
        text: parsed.text,
        answerHash: parsed.answerHash,
      };
    }
    throw new Error('Corrupt question record');
  }
}
