import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, getHashes, timingSafeEqual } from 'node:crypto';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';

@Injectable()
export class HasherService {
  private readonly logger = new Logger(HasherService.name);
  readonly algorithm: string;

  constructor(private readonly configService: ConfigService) {
    this.algorithm = this.configService.get<string>(
      'ANSWER_HASH_ALGORITHM',
      QUIZ_CONFIG.DEFAULT_HASH_ALGORITHM,
    );

    // Cryptographic digests only; md5 and sha1 are refused
    const allowed: readonly string[] = QUIZ_CONFIG.HASH_ALGORITHMS;
    if (
      !allowed.includes(this.algorithm) ||
      !getHashes().includes(this.algorithm)
    ) {
      throw new Error(`Unsupported answer hash algorithm: ${this.algorithm}`);
    }

    this.logger.log(`Hashing answers with ${this.algorithm}`);
  }

  /**
   * Hex digest of the answer's UTF-8 bytes. The answer is hashed verbatim,
   * so "Blue" and "blue" produce different digests.
   */
  digest(answer: string): string {
    return createHash(this.algorithm).update(answer, 'utf8').digest('hex');
  }

  matches(candidate: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.digest(candidate), 'hex');
    const expected = Buffer.from(expectedHash, 'hex');

    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}
