/**
 * Reminder Suppression
 *
 * Decides per recipient whether a due reminder is sent, recorded as skipped,
 * or skipped silently.
 */

import { logger } from '../../utils/logger.js';
import { ErrorCodes, errorMessage } from '../../utils/errors.js';
import type { Client, DeliveryStatus, DueReminder } from '../../types/reminder.js';
import type { ReminderRepository } from './reminder-repository.service.js';
import { isStageAlreadySatisfied } from './stage-tracker.service.js';

export type SuppressionOutcome =
  | 'allow'
  | 'no_email'
  | 'blocklisted'
  | 'unsubscribed'
  | 'already_sent'
  // A check failed; the recipient is skipped without a status row
  | 'inconclusive';

/**
 * Status row written for outcomes that record a decision. `already_sent` and
 * `inconclusive` are silent skips.
 */
export const SUPPRESSION_STATUS: Partial<
  Record<SuppressionOutcome, { status: DeliveryStatus; reason: string }>
> = {
  no_email: { status: 'error', reason: 'No email address' },
  blocklisted: { status: 'blocked', reason: 'Client in blocklist' },
  unsubscribed: { status: 'unsubscribed', reason: 'Client unsubscribed' },
};

type Check = (client: Client, reminder: DueReminder) => Promise<SuppressionOutcome | null>;

/**
 * Decides whether a due reminder may be sent to one client. Checks run in a
 * fixed order and the first match wins.
 */
export class SuppressionEvaluator {
  private readonly checks: ReadonlyArray<{ name: string; run: Check }>;

  constructor(private readonly repository: ReminderRepository) {
    this.checks = [
      { name: 'email', run: async (client) => (hasEmail(client) ? null : 'no_email') },
      {
        name: 'blocklist',
        run: async (client) =>
          (await this.repository.isBlocklisted(client.id)) ? 'blocklisted' : null,
      },
      {
        name: 'unsubscribe',
        run: async (client, reminder) =>
          (await this.repository.isUnsubscribed(reminder.definition.reminderId, client.id))
            ? 'unsubscribed'
            : null,
      },
      {
        name: 'stage',
        run: async (client, reminder) => {
          const priorSent = await this.repository.countSentStatuses(
            reminder.definition.reminderId,
            client.id
          );
          return isStageAlreadySatisfied(
            reminder.definition.daysBeforeDeadline,
            reminder.daysUntilDeadline,
            priorSent
          )
            ? 'already_sent'
            : null;
        },
      },
    ];
  }

  async evaluate(client: Client, reminder: DueReminder): Promise<SuppressionOutcome> {
    for (const check of this.checks) {
      try {
        const outcome = await check.run(client, reminder);
        if (outcome) return outcome;
      } catch (error) {
        logger.error(
          {
            code: ErrorCodes.SUPPRESSION_CHECK_FAILED,
            check: check.name,
            reminderId: reminder.definition.reminderId,
            clientId: client.id,
            error: errorMessage(error),
          },
          'Suppression check failed, skipping recipient'
        );
        return 'inconclusive';
      }
    }
    return 'allow';
  }
}

function hasEmail(client: Client): boolean {
  return typeof client.email === 'string' && client.email.trim().length > 0;
}
