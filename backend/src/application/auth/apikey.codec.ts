/**
 * API Key Codec
 * Secret format: `<marker>_<base64url of 32 random bytes>`, e.g. `hk_3q2-7w...`
 *
 * Only the bcrypt hash and the 8-char display prefix are ever stored.
 */

import crypto from 'crypto';
import type { PasswordHasher } from './password.hasher.js';

const RANDOM_BYTES = 32;
const MIN_PAYLOAD_LENGTH = 32;
export const KEY_PREFIX_LENGTH = 8;

const PAYLOAD_PATTERN = /^[A-Za-z0-9_-]+$/;

export class ApiKeyCodec {
  private readonly marker: string;
  private readonly hasher: PasswordHasher;

  constructor(marker: string, hasher: PasswordHasher) {
    this.marker = `${marker}_`;
    this.hasher = hasher;
  }

  generate(): string {
    return this.marker + crypto.randomBytes(RANDOM_BYTES).toString('base64url');
  }

  derivePrefix(secret: string): string {
    return secret.slice(0, KEY_PREFIX_LENGTH);
  }

  /**
   * Cheap shape check done before any storage or hashing work
   */
  isWellFormed(secret: string): boolean {
    if (!secret.startsWith(this.marker)) {
      return false;
    }
    const payload = secret.slice(this.marker.length);
    return payload.length >= MIN_PAYLOAD_LENGTH && PAYLOAD_PATTERN.test(payload);
  }

  hash(secret: string): Promise<string> {
    return this.hasher.hash(secret);
  }

  verify(secret: string, hash: string): Promise<boolean> {
    return this.hasher.verify(secret, hash);
  }
}
