export enum QuizErrorKind {
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_IDENTITY = 'INVALID_IDENTITY',
  EMPTY_EDUCATOR_SET = 'EMPTY_EDUCATOR_SET',
  ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
}

/**
 * Base class for failures raised by the quiz components. The contract
 * translates these into HTTP exceptions; anything else propagates as-is.
 */
export abstract class QuizError extends Error {
  abstract readonly kind: QuizErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends QuizError {
  readonly kind = QuizErrorKind.UNAUTHORIZED;

  constructor(
    readonly identity: string,
    readonly action: string,
  ) {
    super(`${identity} is not allowed to ${action}`);
  }
}

export class QuestionNotFoundError extends QuizError {
  readonly kind = QuizErrorKind.NOT_FOUND;

  constructor(readonly questionId: number) {
    super(`Question ${questionId} does not exist`);
  }
}

export class InvalidIdentityError extends QuizError {
  readonly kind = QuizErrorKind.INVALID_IDENTITY;

  constructor() {
    super('Identity must be a non-empty string without surrounding whitespace');
  }
}

export class EmptyEducatorSetError extends QuizError {
  readonly kind = QuizErrorKind.EMPTY_EDUCATOR_SET;

  constructor() {
    super('A quiz needs at least one initial educator');
  }
}

export class AlreadyInitializedError extends QuizError {
  readonly kind = QuizErrorKind.ALREADY_INITIALIZED;

  constructor() {
    super('Quiz has already been initialized');
  }
}

export class NotInitializedError extends QuizError {
  readonly kind = QuizErrorKind.NOT_INITIALIZED;

  constructor() {
    super('Quiz has not been initialized');
  }
}
