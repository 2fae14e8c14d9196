/**
 * Password Hasher
 * bcrypt with a per-hash random salt; the cost factor comes from config.
 */

import bcrypt from 'bcrypt';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('password-hasher');

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hash: string): Promise<boolean>;
}

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly rounds: number;

  constructor(rounds: number) {
    this.rounds = rounds;
  }

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.rounds);
  }

  async verify(plaintext: string, hash: string): Promise<boolean> {
    if (!hash) {
      return false;
    }
    try {
      return await bcrypt.compare(plaintext, hash);
    } catch (error) {
      // Malformed stored hash: a mismatch to the caller
      logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Hash comparison failed');
      return false;
    }
  }
}
