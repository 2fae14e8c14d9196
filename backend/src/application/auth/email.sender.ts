/**
 * Transactional email
 * No mail provider is wired in: links are written to the structured log.
 */

import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('email-sender');

export interface TransactionalEmailSender {
  sendVerificationEmail(to: string, link: string): Promise<void>;
  sendPasswordResetEmail(to: string, link: string): Promise<void>;
}

export class LoggingEmailSender implements TransactionalEmailSender {
  async sendVerificationEmail(to: string, link: string): Promise<void> {
    logger.info({ to, link }, `Verification link for ${to}`);
  }

  async sendPasswordResetEmail(to: string, link: string): Promise<void> {
    logger.info({ to, link }, `Password reset link for ${to}`);
  }
}
