import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleInit,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyValueStore } from '../storage/key-value.store';
import { QuizKeys } from '../storage/quiz-keys';
import { AccessControlService } from '../access-control/access-control.service';
import { QuizStoreService } from '../quiz-store/quiz-store.service';
import { HasherService } from '../hasher/hasher.service';
import {
  Question,
  QuestionSummary,
} from '../../common/interfaces/question.interface';
import { RoleAssignment } from '../../common/interfaces/power-level.interface';
import { QuizMeta } from '../../common/interfaces/quiz.interface';
import {
  AlreadyInitializedError,
  EmptyEducatorSetError,
  NotInitializedError,
  QuizError,
  QuizErrorKind,
} from '../../common/errors/quiz.errors';

export function parseEducatorList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((identity) => identity.trim())
    .filter((identity) => identity.length > 0);
}

export function toHttpException(error: QuizError): HttpException {
  switch (error.kind) {
    case QuizErrorKind.UNAUTHORIZED:
      return new ForbiddenException(error.message);
    case QuizErrorKind.NOT_FOUND:
      return new NotFoundException(error.message);
    case QuizErrorKind.INVALID_IDENTITY:
    case QuizErrorKind.EMPTY_EDUCATOR_SET:
      return new BadRequestException(error.message);
    case QuizErrorKind.ALREADY_INITIALIZED:
      return new ConflictException(error.message);
    case QuizErrorKind.NOT_INITIALIZED:
      return new ServiceUnavailableException(error.message);
  }
}

/**
 * Entry points of the quiz. Mutations run one at a time, in arrival order,
 * and each commits all of its writes at once or none of them.
 */
@Injectable()
export class QuizContractService implements OnModuleInit {
  private readonly logger = new Logger(QuizContractService.name);
  private queue: Promise<unknown> = Promise.resolve();
  private initialized = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly store: KeyValueStore,
    private readonly keys: QuizKeys,
    private readonly accessControl: AccessControlService,
    private readonly quizStore: QuizStoreService,
    private readonly hasher: HasherService,
  ) {}

  async onModuleInit() {
    const meta = await this.readMeta();
    if (meta) {
      // Stored hashes only verify under the algorithm that produced them
      if (meta.hashAlgorithm !== this.hasher.algorithm) {
        throw new Error(
          `Quiz answers were hashed with ${meta.hashAlgorithm} but ` +
            `ANSWER_HASH_ALGORITHM is ${this.hasher.algorithm}`,
        );
      }
      this.initialized = true;
      this.logger.log(
        `Resuming quiz created at ${new Date(meta.createdAt).toISOString()}`,
      );
      return;
    }

    const educators = parseEducatorList(
      this.configService.get<string>('QUIZ_INITIAL_EDUCATORS'),
    );
    await this.instantiate(educators);
  }

  /** The deployment-time constructor. */
  async instantiate(initialEducators: Iterable<string>): Promise<void> {
    return this.invoke(async () => {
      const educators = new Set(
        Array.from(initialEducators, (identity) => identity.trim()).filter(
          (identity) => identity.length > 0,
        ),
      );
      if (educators.size === 0) throw new EmptyEducatorSetError();

      if (this.initialized || (await this.readMeta())) {
        throw new AlreadyInitializedError();
      }

      const meta: QuizMeta = {
        createdAt: Date.now(),
        educators: educators.size,
        hashAlgorithm: this.hasher.algorithm,
      };
      await this.store.commit({
        ...this.accessControl.educatorEntries(educators),
        [this.keys.meta()]: JSON.stringify(meta),
      });

      this.initialized = true;
      this.logger.log(`Quiz created with ${educators.size} educator(s)`);
    });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async addQuestion(
    text: string,
    answer: string,
    caller: string,
  ): Promise<number> {
    return this.mutate(() =>
      this.quizStore.addQuestion(text, answer, caller),
    );
  }

  async registerUser(caller: string): Promise<RoleAssignment> {
    return this.mutate(async () => ({
      identity: caller,
      powerLevel: await this.accessControl.registerUser(caller),
    }));
  }

  async grantEducator(
    identity: string,
    caller: string,
  ): Promise<RoleAssignment> {
    return this.mutate(async () => ({
      identity,
      powerLevel: await this.accessControl.grantEducator(identity, caller),
    }));
  }

  async checkAnswer(questionId: number, candidate: string): Promise<boolean> {
    return this.read(() => this.quizStore.checkAnswer(questionId, candidate));
  }

  async getQuestion(questionId: number): Promise<Question> {
    return this.read(() => this.quizStore.getQuestion(questionId));
  }

  async listQuestions(): Promise<QuestionSummary[]> {
    return this.read(() => this.quizStore.listQuestions());
  }

  async powerOf(identity: string): Promise<RoleAssignment> {
    return this.read(async () => ({
      identity,
      powerLevel: await this.accessControl.powerOf(identity),
    }));
  }

  private async readMeta(): Promise<QuizMeta | null> {
    const data = await this.store.get(this.keys.meta());
    if (!data) return null;
    const parsed: unknown = JSON.parse(data);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'createdAt' in parsed &&
      'educators' in parsed &&
      'hashAlgorithm' in parsed &&
      typeof parsed.createdAt === 'number' &&
      typeof parsed.educators === 'number' &&
      typeof parsed.hashAlgorithm === 'string'
    ) {
      return {
        createdAt: parsed.createdAt,
        educators: parsed.educators,
        hashAlgorithm: parsed.hashAlgorithm,
      };
    }
    throw new Error('Corrupt quiz metadata');
  }

  /** Queues a mutating call behind the ones already in flight. */
  private invoke<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(() => this.translate(operation));
    // Failures reach the caller through `result`; the queue keeps going.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private mutate<T>(operation: () => Promise<T>): Promise<T> {
    return this.invoke(() => {
      this.assertInitialized();
      return operation();
    });
  }

  private read<T>(operation: () => Promise<T>): Promise<T> {
    return this.translate(() => {
      this.assertInitialized();
      return operation();
    });
  }

  private assertInitialized(): void {
    if (!this.initialized) throw new NotInitializedError();
  }

  private async translate<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof QuizError) throw toHttpException(error);
      throw error;
    }
  }
}
