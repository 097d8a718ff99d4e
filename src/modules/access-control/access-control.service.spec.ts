import { AccessControlService } from './access-control.service';
import { MemoryKeyValueStore } from '../storage/memory-key-value.store';
import { QuizKeys } from '../storage/quiz-keys';
import { PowerLevel } from '../../common/interfaces/power-level.interface';
import {
  InvalidIdentityError,
  QuizErrorKind,
  UnauthorizedError,
} from '../../common/errors/quiz.errors';

describe('AccessControlService', () => {
  let store: MemoryKeyValueStore;
  let accessControl: AccessControlService;

  beforeEach(async () => {
    store = new MemoryKeyValueStore();
    accessControl = new AccessControlService(store, new QuizKeys());
    await store.commit(accessControl.educatorEntries(['educator-1']));
  });

  describe('powerOf', () => {
    it('should resolve stored roles', async () => {
      await accessControl.registerUser('user-1');

      expect(await accessControl.powerOf('educator-1')).toBe(
        PowerLevel.EDUCATOR,
      );
      expect(await accessControl.powerOf('user-1')).toBe(PowerLevel.USER);
    });

    it('should report unknown identities as unregistered', async () => {
      expect(await accessControl.powerOf('stranger')).toBe(
        PowerLevel.UNREGISTERED,
      );
      expect(await accessControl.powerOf('')).toBe(PowerLevel.UNREGISTERED);
    });

    it('should ignore unrecognised stored values', async () => {
      await store.commit({ 'quiz:role:odd': 'ADMIN' });

      expect(await accessControl.powerOf('odd')).toBe(PowerLevel.UNREGISTERED);
    });
  });

  describe('registerUser', () => {
    it('should register an unregistered identity as a user', async () => {
      expect(await accessControl.registerUser('user-1')).toBe(PowerLevel.USER);
      expect(await store.get('quiz:role:user-1')).toBe('USER');
    });

    it('should be idempotent', async () => {
      await accessControl.registerUser('user-1');
      const once = store.snapshot();

      expect(await accessControl.registerUser('user-1')).toBe(PowerLevel.USER);
      expect(store.snapshot()).toEqual(once);
    });

    it('should not demote an educator', async () => {
      expect(await accessControl.registerUser('educator-1')).toBe(
        PowerLevel.EDUCATOR,
      );
      expect(await accessControl.powerOf('educator-1')).toBe(
        PowerLevel.EDUCATOR,
      );
    });

    it('should reject a blank identity', async () => {
      await expect(accessControl.registerUser('')).rejects.toBeInstanceOf(
        InvalidIdentityError,
      );
      await expect(accessControl.registerUser(' user ')).rejects.toBeInstanceOf(
        InvalidIdentityError,
      );
    });
  });

  describe('grantEducator', () => {
    it('should let an educator grant the role', async () => {
      expect(
        await accessControl.grantEducator('educator-2', 'educator-1'),
      ).toBe(PowerLevel.EDUCATOR);
      expect(await accessControl.powerOf('educator-2')).toBe(
        PowerLevel.EDUCATOR,
      );
    });

    it('should promote a registered user', async () => {
      await accessControl.registerUser('user-1');
      await accessControl.grantEducator('user-1', 'educator-1');

      expect(await accessControl.powerOf('user-1')).toBe(PowerLevel.EDUCATOR);
    });

    it('should reject other requesters without writing', async () => {
      await accessControl.registerUser('user-1');
      const before = store.snapshot();

      const fromUser = accessControl.grantEducator('user-2', 'user-1');
      await expect(fromUser).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        accessControl.grantEducator('user-2', 'stranger'),
      ).rejects.toMatchObject({ kind: QuizErrorKind.UNAUTHORIZED });

      expect(store.snapshot()).toEqual(before);
    });

    it('should not let a user grant the role to themselves', async () => {
      await accessControl.registerUser('user-1');

      await expect(
        accessControl.grantEducator('user-1', 'user-1'),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      expect(await accessControl.powerOf('user-1')).toBe(PowerLevel.USER);
    });
  });

  describe('educatorEntries', () => {
    it('should map every identity to an educator role key', () => {
      expect(accessControl.educatorEntries(['a', 'b'])).toEqual({
        'quiz:role:a': 'EDUCATOR',
        'quiz:role:b': 'EDUCATOR',
      });
    });

    it('should reject a blank identity', () => {
      expect(() => accessControl.educatorEntries(['a', ''])).toThrow(
        InvalidIdentityError,
      );
    });
  });
});
