import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';

/** Builds the namespaced keys the quiz state lives under. */
export class QuizKeys {
  constructor(readonly prefix: string = QUIZ_CONFIG.DEFAULT_KEY_PREFIX) {}

  meta(): string {
    return `${this.prefix}:${QUIZ_CONFIG.KEYS.META}`;
  }

  nextQuestionId(): string {
    return `${this.prefix}:${QUIZ_CONFIG.KEYS.NEXT_QUESTION_ID}`;
  }

  question(id: number): string {
    return `${this.prefix}:${QUIZ_CONFIG.KEYS.QUESTION}:${id}`;
  }

  role(identity: string): string {
    return `${this.prefix}:${QUIZ_CONFIG.KEYS.ROLE}:${identity}`;
  }
}
