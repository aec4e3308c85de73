import type { Logger } from '../logging/logger.js';
import type { EmailContext, Notifier } from './notifier.js';

export interface EmailTemplates {
  verificationSubject: string;
  passwordResetSubject: string;
}

const DEFAULT_TEMPLATES: EmailTemplates = {
  verificationSubject: 'Verify your email address',
  passwordResetSubject: 'Reset your password'
};

function emailDomain(email: string): string | null {
  const separator = email.lastIndexOf('@');
  if (separator < 0 || separator === email.length - 1) {
    return null;
  }

  return email.slice(separator + 1).toLowerCase();
}

/**
 * Development notifier: records that a message would have been sent. The
 * code itself is never written to the log.
 */
export class LoggingNotifier implements Notifier {
  private readonly templates: EmailTemplates;

  public constructor(
    private readonly logger: Logger,
    templates: Partial<EmailTemplates> = {}
  ) {
    this.templates = { ...DEFAULT_TEMPLATES, ...templates };
  }

  public sendVerificationEmail(email: string, _verificationCode: string, context: EmailContext): Promise<void> {
    this.logger.info({
      emailDomain: emailDomain(email),
      subject: this.templates.verificationSubject,
      firstName: context.firstName
    }, 'verification_email_queued');
    return Promise.resolve();
  }

  public sendPasswordResetEmail(email: string, _resetToken: string, context: EmailContext): Promise<void> {
    this.logger.info({
      emailDomain: emailDomain(email),
      subject: this.templates.passwordResetSubject,
      firstName: context.firstName
    }, 'password_reset_email_queued');
    return Promise.resolve();
  }
}
