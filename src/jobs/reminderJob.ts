/**
 * Daily Reminder Job
 *
 * One selection + dispatch pass over the reminder catalog for a given day.
 * Scheduled once a day (see .github/workflows/reminder-cron.yml).
 */

import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { toIsoDate, type IsoDate } from '../utils/dates.js';
import { ResendClient, type MailSender } from '../services/email/resend.client.js';
import {
  PgReminderRepository,
  type ReminderRepository,
} from '../services/reminders/reminder-repository.service.js';
import { ReminderDispatcher } from '../services/reminders/dispatch.service.js';

export interface ReminderJobResult {
  today: IsoDate;
  successCount: number;
  errorCount: number;
  durationMs: number;
}

export interface ReminderJobDependencies {
  repository?: ReminderRepository;
  mailer?: MailSender;
  batchSize?: number;
}

export function createResendClient(): ResendClient {
  return new ResendClient({
    apiKey: env.RESEND_API_KEY,
    fromEmail: env.RESEND_FROM_EMAIL,
    fromName: env.RESEND_FROM_NAME,
    baseUrl: env.RESEND_API_URL,
  });
}

/**
 * Run the reminder job for `today` (defaults to the current UTC date)
 */
export async function runReminderJob(
  today: IsoDate = toIsoDate(),
  deps: ReminderJobDependencies = {}
): Promise<ReminderJobResult> {
  const startTime = Date.now();

  const dispatcher = new ReminderDispatcher({
    repository: deps.repository ?? new PgReminderRepository(),
    mailer: deps.mailer ?? createResendClient(),
    batchSize: deps.batchSize ?? env.EMAIL_BATCH_SIZE,
  });

  const { successCount, errorCount } = await dispatcher.processReminders(today);
  const durationMs = Date.now() - startTime;

  logger.info(
    { today, successCount, errorCount, durationMs },
    `Summary: ${successCount} emails sent, ${errorCount} errors`
  );

  return { today, successCount, errorCount, durationMs };
}
