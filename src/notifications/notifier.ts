export interface EmailContext {
  firstName: string;
}

export interface Notifier {
  sendVerificationEmail(email: string, verificationCode: string, context: EmailContext): Promise<void>;
  sendPasswordResetEmail(email: string, resetToken: string, context: EmailContext): Promise<void>;
}
