/**
 * Reminder Dispatch
 *
 * Drives one daily pass: selects due reminders, runs every receiver through
 * suppression, personalizes the allowed ones and sends them in fixed-size
 * batches, writing one status row per decided recipient.
 *
 * Counters are per recipient. A failing batch records `error` rows for its
 * recipients and the run carries on with the next batch.
 */

import { logger } from '../../utils/logger.js';
import { ErrorCodes, errorMessage } from '../../utils/errors.js';
import type { IsoDate } from '../../utils/dates.js';
import type {
  Client,
  DeliveryStatus,
  DeliveryStatusRecord,
  DispatchSummary,
  DueReminder,
} from '../../types/reminder.js';
import type { MailSendResult, MailSender, OutboundEmail } from '../email/resend.client.js';
import type { ReminderRepository } from './reminder-repository.service.js';
import { ReminderSelector } from './reminder-selector.service.js';
import { SuppressionEvaluator, SUPPRESSION_STATUS } from './suppression.service.js';
import { fullName, personalizeEmail } from './template-renderer.service.js';

export const EMAIL_BATCH_SIZE = 100;

export interface PendingEmail {
  reminderId: number;
  clientId: number;
  email: OutboundEmail;
}

export interface ReminderDispatcherOptions {
  repository: ReminderRepository;
  mailer: MailSender;
  batchSize?: number;
  evaluator?: SuppressionEvaluator;
}

export function createChunks<T>(items: readonly T[], chunkSize: number): T[][] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

export class ReminderDispatcher {
  private readonly repository: ReminderRepository;
  private readonly mailer: MailSender;
  private readonly batchSize: number;
  private readonly selector: ReminderSelector;
  private readonly evaluator: SuppressionEvaluator;

  constructor(options: ReminderDispatcherOptions) {
    this.repository = options.repository;
    this.mailer = options.mailer;
    this.batchSize = options.batchSize ?? EMAIL_BATCH_SIZE;
    this.selector = new ReminderSelector(options.repository);
    this.evaluator = options.evaluator ?? new SuppressionEvaluator(options.repository);
  }

  async processReminders(today: IsoDate): Promise<DispatchSummary> {
    logger.info({ today }, 'Starting reminder processing');

    const reminders = await this.selector.selectDue(today);
    const summary: DispatchSummary = { successCount: 0, errorCount: 0 };
    const pending: PendingEmail[] = [];

    for (const reminder of reminders) {
      logger.info(
        {
          reminderId: reminder.definition.reminderId,
          reminderType: reminder.reminderTypeName,
          daysUntilDeadline: reminder.daysUntilDeadline,
          receivers: reminder.receivers.length,
        },
        'Processing reminder'
      );

      for (const client of reminder.receivers) {
        await this.processRecipient(reminder, client, pending, summary);
      }
    }

    for (const batch of createChunks(pending, this.batchSize)) {
      await this.sendBatch(batch, summary);
    }

    logger.info(
      { today, reminders: reminders.length, ...summary },
      'Reminder processing completed'
    );
    return summary;
  }

  private async processRecipient(
    reminder: DueReminder,
    client: Client,
    pending: PendingEmail[],
    summary: DispatchSummary
  ): Promise<void> {
    const { reminderId } = reminder.definition;

    try {
      const outcome = await this.evaluator.evaluate(client, reminder);

      if (outcome === 'allow' && client.email) {
        const { subject, body } = personalizeEmail(reminder, client);
        pending.push({
          reminderId,
          clientId: client.id,
          email: { toEmail: client.email, toName: fullName(client), subject, html: body },
        });
        return;
      }

      const decision = SUPPRESSION_STATUS[outcome];
      if (decision) {
        await this.recordStatuses([
          { reminderId, clientId: client.id, status: decision.status, errorMessage: decision.reason },
        ]);
        if (decision.status === 'error') summary.errorCount++;
      }

      logger.info({ reminderId, clientId: client.id, outcome }, 'Recipient skipped');
    } catch (error) {
      const message = errorMessage(error);
      logger.error(
        { code: ErrorCodes.RECIPIENT_PROCESSING_FAILED, reminderId, clientId: client.id, error: message },
        'Error processing recipient'
      );
      await this.recordStatuses([
        { reminderId, clientId: client.id, status: 'error', errorMessage: message },
      ]);
      summary.errorCount++;
    }
  }

  private async sendBatch(batch: PendingEmail[], summary: DispatchSummary): Promise<void> {
    let result: MailSendResult;
    try {
      result = await this.mailer.sendBatch(batch.map((item) => item.email));
    } catch (error) {
      result = { success: false, error: errorMessage(error) };
    }

    if (result.success) {
      await this.recordBatch(batch, 'sent', null);
      summary.successCount += batch.length;
      logger.info(
        { recipients: batch.length, messageIds: result.messageIds.length },
        'Reminder batch sent'
      );
      return;
    }

    await this.recordBatch(batch, 'error', result.error || 'Unknown error');
    summary.errorCount += batch.length;
    logger.error(
      { code: ErrorCodes.MAIL_SEND_FAILED, recipients: batch.length, error: result.error },
      'Reminder batch failed'
    );
  }

  private async recordBatch(
    batch: PendingEmail[],
    status: DeliveryStatus,
    message: string | null
  ): Promise<void> {
    await this.recordStatuses(
      batch.map((item) => ({
        reminderId: item.reminderId,
        clientId: item.clientId,
        status,
        errorMessage: message,
      }))
    );
  }

  /**
   * Write failures are logged and do not interrupt the run.
   */
  private async recordStatuses(records: DeliveryStatusRecord[]): Promise<void> {
    try {
      await this.repository.insertStatuses(records);
      logger.debug(
        { count: records.length, status: records[0]?.status },
        'Recorded reminder statuses'
      );
    } catch (error) {
      logger.error(
        {
          code: ErrorCodes.STATUS_WRITE_FAILED,
          records: records.map(({ reminderId, clientId, status }) => ({ reminderId, clientId, status })),
          error: errorMessage(error),
        },
        'Error recording reminder statuses'
      );
    }
  }
}
