import type { EmailContext, Notifier } from '../../src/notifications/notifier.js';

export interface SentEmail {
  kind: 'verification' | 'password_reset';
  email: string;
  code: string;
  context: EmailContext;
}

export class RecordingNotifier implements Notifier {
  public readonly sent: SentEmail[] = [];

  public sendVerificationEmail(email: string, verificationCode: string, context: EmailContext): Promise<void> {
    this.sent.push({ kind: 'verification', email, code: verificationCode, context });
    return Promise.resolve();
  }

  public sendPasswordResetEmail(email: string, resetToken: string, context: EmailContext): Promise<void> {
    this.sent.push({ kind: 'password_reset', email, code: resetToken, context });
    return Promise.resolve();
  }

  public lastCodeFor(email: string, kind: SentEmail['kind']): string {
    const match = [...this.sent].reverse().find((message) => message.email === email && message.kind === kind);
    if (match === undefined) {
      throw new Error(`No ${kind} email was sent to ${email}.`);
    }

    return match.code;
  }
}
