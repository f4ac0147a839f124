import type { MailSendResult, MailSender, OutboundEmail } from '../../services/email/resend.client.js';

/**
 * Mail sender that records every batch and answers with a scripted result
 */
export class RecordingMailer implements MailSender {
  readonly batches: OutboundEmail[][] = [];
  readonly singles: OutboundEmail[] = [];

  constructor(private readonly respond: (emails: OutboundEmail[]) => MailSendResult = okResult) {}

  async sendEmail(email: OutboundEmail): Promise<MailSendResult> {
    this.singles.push(email);
    return this.respond([email]);
  }

  async sendBatch(emails: OutboundEmail[]): Promise<MailSendResult> {
    this.batches.push(emails);
    return this.respond(emails);
  }
}

function okResult(emails: OutboundEmail[]): MailSendResult {
  return { success: true, messageIds: emails.map((_email, i) => `msg-${i + 1}`) };
}
