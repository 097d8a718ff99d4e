import { Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from '../storage/key-value.store';
import { QuizKeys } from '../storage/quiz-keys';
import {
  PowerLevel,
  StoredPowerLevel,
} from '../../common/interfaces/power-level.interface';
import {
  InvalidIdentityError,
  UnauthorizedError,
} from '../../common/errors/quiz.errors';

function isStoredPowerLevel(value: string): value is StoredPowerLevel {
  return value === PowerLevel.EDUCATOR || value === PowerLevel.USER;
}

@Injectable()
export class AccessControlService {
  private readonly logger = new Logger(AccessControlService.name);

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: QuizKeys,
  ) {}

  async powerOf(identity: string): Promise<PowerLevel> {
    if (!identity) return PowerLevel.UNREGISTERED;

    const role = await this.store.get(this.keys.role(identity));
    if (role === null) return PowerLevel.UNREGISTERED;

    if (!isStoredPowerLevel(role)) {
      this.logger.warn(`Ignoring unknown role "${role}" for ${identity}`);
      return PowerLevel.UNREGISTERED;
    }

    return role;
  }

  async requireEducator(identity: string, action: string): Promise<void> {
    const power = await this.powerOf(identity);
    if (power !== PowerLevel.EDUCATOR) {
      this.logger.warn(`Rejected ${action} by ${identity} (${power})`);
      throw new UnauthorizedError(identity, action);
    }
  }

  /**
   * Makes `identity` an Educator. A registered User is promoted, since an
   * identity holds a single role.
   */
  async grantEducator(
    identity: string,
    requester: string,
  ): Promise<PowerLevel> {
    this.assertIdentity(identity);
    await this.requireEducator(requester, 'grant the educator role');

    const current = await this.powerOf(identity);
    if (current === PowerLevel.EDUCATOR) return current;

    await this.store.commit({
      [this.keys.role(identity)]: PowerLevel.EDUCATOR,
    });
    this.logger.log(`${requester} granted educator role to ${identity}`);
    return PowerLevel.EDUCATOR;
  }

  /** Self-service and idempotent. Never demotes an Educator. */
  async registerUser(identity: string): Promise<PowerLevel> {
    this.assertIdentity(identity);

    const current = await this.powerOf(identity);
    if (current !== PowerLevel.UNREGISTERED) return current;

    await this.store.commit({ [this.keys.role(identity)]: PowerLevel.USER });
    this.logger.log(`Registered user ${identity}`);
    return PowerLevel.USER;
  }

  /**
   * Role entries for the initial educator set, for the caller to commit
   * together with the rest of the instantiation state.
   */
  educatorEntries(identities: Iterable<string>): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const identity of identities) {
      this.assertIdentity(identity);
      entries[this.keys.role(identity)] = PowerLevel.EDUCATOR;
    }
    return entries;
  }

  private assertIdentity(identity: string): void {
    if (!identity || identity.trim() !== identity) {
      throw new InvalidIdentityError();
    }
  }
}
