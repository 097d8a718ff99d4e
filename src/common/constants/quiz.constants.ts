export const QUIZ_CONFIG = {
  CALLER_HEADER: 'x-caller-id',
  DEFAULT_KEY_PREFIX: 'quiz',
  DEFAULT_HASH_ALGORITHM: 'sha256',
  HASH_ALGORITHMS: [
    'sha256',
    'sha384',
    'sha512',
    'sha3-256',
    'sha3-384',
    'sha3-512',
  ],

  // Key suffixes, joined to the prefix with ':'
  KEYS: {
    META: 'meta',
    NEXT_QUESTION_ID: 'questions:next',
    QUESTION: 'question',
    ROLE: 'role',
  },

  STORAGE_DRIVERS: {
    REDIS: 'redis',
    MEMORY: 'memory',
  },
} as const;
