import { ConfigService } from '@nestjs/config';
import { QuizStoreService } from './quiz-store.service';
import { HasherService } from '../hasher/hasher.service';
import { AccessControlService } from '../access-control/access-control.service';
import { MemoryKeyValueStore } from '../storage/memory-key-value.store';
import { QuizKeys } from '../storage/quiz-keys';
import {
  QuestionNotFoundError,
  UnauthorizedError,
} from '../../common/errors/quiz.errors';

describe('QuizStoreService', () => {
  let store: MemoryKeyValueStore;
  let hasher: HasherService;
  let accessControl: AccessControlService;
  let quizStore: QuizStoreService;

  beforeEach(async () => {
    const keys = new QuizKeys();
    store = new MemoryKeyValueStore();
    hasher = new HasherService(new ConfigService());
    accessControl = new AccessControlService(store, keys);
    quizStore = new QuizStoreService(store, keys, hasher, accessControl);

    await store.commit(accessControl.educatorEntries(['educator-1']));
  });

  describe('addQuestion', () => {
    it('should allocate sequential ids from zero', async () => {
      expect(
        await quizStore.addQuestion('Sky color?', 'Blue', 'educator-1'),
      ).toBe(0);
      expect(await quizStore.addQuestion('2+2?', '4', 'educator-1')).toBe(1);
      expect(await quizStore.count()).toBe(2);
    });

    it('should persist the digest and never the plaintext answer', async () => {
      await quizStore.addQuestion(
        'Capital of France?',
        'Paris-answer',
        'educator-1',
      );

      const stored = await store.get('quiz:question:0');
      expect(stored).toBe(
        JSON.stringify({
          id: 0,
          text: 'Capital of France?',
          answerHash: hasher.digest('Paris-answer'),
        }),
      );
      for (const value of store.snapshot().values()) {
        expect(value).not.toContain('Paris-answer');
      }
    });

    it('should reject non-educators without writing', async () => {
      await quizStore.addQuestion('2+2?', '4', 'educator-1');
      await accessControl.registerUser('user-1');
      const before = store.snapshot();

      await expect(
        quizStore.addQuestion('3+3?', '6', 'user-1'),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        quizStore.addQuestion('3+3?', '6', 'stranger'),
      ).rejects.toBeInstanceOf(UnauthorizedError);

      expect(store.snapshot()).toEqual(before);
      expect(await quizStore.listQuestions()).toEqual([
        { id: 0, text: '2+2?' },
      ]);
    });
  });

  describe('checkAnswer', () => {
    beforeEach(async () => {
      await quizStore.addQuestion('Sky color?', 'Blue', 'educator-1');
    });

    it('should accept the stored answer', async () => {
      expect(await quizStore.checkAnswer(0, 'Blue')).toBe(true);
    });

    it('should reject any other answer', async () => {
      expect(await quizStore.checkAnswer(0, 'Green')).toBe(false);
      expect(await quizStore.checkAnswer(0, 'blue')).toBe(false);
      expect(await quizStore.checkAnswer(0, '')).toBe(false);
    });

    it('should give the same result when asked again', async () => {
      const first = await quizStore.checkAnswer(0, 'Blue');
      const second = await quizStore.checkAnswer(0, 'Blue');

      expect(first).toBe(second);
    });

    it('should not write anything', async () => {
      const before = store.snapshot();

      await quizStore.checkAnswer(0, 'Blue');
      await quizStore.checkAnswer(0, 'Green');

      expect(store.snapshot()).toEqual(before);
    });

    it('should fail for ids that were never allocated', async () => {
      await expect(quizStore.checkAnswer(1, 'x')).rejects.toBeInstanceOf(
        QuestionNotFoundError,
      );
      await expect(quizStore.checkAnswer(-1, 'x')).rejects.toBeInstanceOf(
        QuestionNotFoundError,
      );
      await expect(quizStore.checkAnswer(0.5, 'x')).rejects.toBeInstanceOf(
        QuestionNotFoundError,
      );
    });
  });

  describe('getQuestion', () => {
    it('should return the stored question with its hash', async () => {
      await quizStore.addQuestion('2+2?', '4', 'educator-1');

      expect(await quizStore.getQuestion(0)).toEqual({
        id: 0,
        text: '2+2?',
        answerHash: hasher.digest('4'),
      });
    });

    it('should fail on an empty quiz', async () => {
      await expect(quizStore.getQuestion(0)).rejects.toMatchObject({
        questionId: 0,
        message: 'Question 0 does not exist',
      });
    });
  });

  describe('listQuestions', () => {
    it('should return an empty list for a new quiz', async () => {
      expect(await quizStore.listQuestions()).toEqual([]);
    });

    it('should return id and text in insertion order', async () => {
      await quizStore.addQuestion('first', 'a', 'educator-1');
      await quizStore.addQuestion('second', 'b', 'educator-1');
      await quizStore.addQuestion('third', 'c', 'educator-1');

      expect(await quizStore.listQuestions()).toEqual([
        { id: 0, text: 'first' },
        { id: 1, text: 'second' },
        { id: 2, text: 'third' },
      ]);
    });

    it('should reflect questions added after an earlier listing', async () => {
      await quizStore.addQuestion('first', 'a', 'educator-1');
      const earlier = await quizStore.listQuestions();
      await quizStore.addQuestion('second', 'b', 'educator-1');

      expect(earlier).toHaveLength(1);
      expect(await quizStore.listQuestions()).toHaveLength(2);
    });
  });

  describe('count', () => {
    it('should refuse a corrupt counter', async () => {
      await store.commit({ 'quiz:questions:next': 'abc' });

      await expect(quizStore.count()).rejects.toThrow(
        'Corrupt question counter: abc',
      );
    });
  });
});
