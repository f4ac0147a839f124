/**
 * Reminder Selector
 *
 * Finds the reminder definitions due on a given day: a definition is due when
 * the whole number of days until its deadline is exactly one of its offsets.
 * Receivers and the type → template chain are resolved per definition.
 */

import { logger } from '../../utils/logger.js';
import { ErrorCodes, errorMessage } from '../../utils/errors.js';
import { daysBetween, type IsoDate } from '../../utils/dates.js';
import type { Client, DueReminder, ReminderDefinition } from '../../types/reminder.js';
import type { ReminderRepository } from './reminder-repository.service.js';

export function isDueOn(definition: ReminderDefinition, today: IsoDate): boolean {
  const daysUntilDeadline = daysBetween(today, definition.deadline);
  return daysUntilDeadline >= 0 && definition.daysBeforeDeadline.includes(daysUntilDeadline);
}

export class ReminderSelector {
  constructor(private readonly repository: ReminderRepository) {}

  async selectDue(today: IsoDate): Promise<DueReminder[]> {
    let definitions: ReminderDefinition[];
    try {
      definitions = await this.repository.findDefinitionsWithDeadlineFrom(today);
    } catch (error) {
      logger.error(
        { code: ErrorCodes.REMINDER_FETCH_FAILED, today, error: errorMessage(error) },
        'Error fetching reminder definitions'
      );
      return [];
    }

    const due: DueReminder[] = [];
    for (const definition of definitions) {
      if (!isDueOn(definition, today)) continue;

      const reminder = await this.resolve(definition, today);
      if (reminder) due.push(reminder);
    }

    logger.info({ today, scanned: definitions.length, due: due.length }, 'Selected due reminders');
    return due;
  }

  private async resolve(definition: ReminderDefinition, today: IsoDate): Promise<DueReminder | null> {
    const { reminderId, reminderTypeId } = definition;

    let chain: Pick<DueReminder, 'reminderTypeName' | 'template'> | null;
    try {
      chain = await this.resolveTemplate(definition);
    } catch (error) {
      logger.error(
        { code: ErrorCodes.REMINDER_FETCH_FAILED, reminderId, reminderTypeId, error: errorMessage(error) },
        'Error resolving reminder template, skipping definition'
      );
      return null;
    }
    if (!chain) return null;

    return {
      definition,
      reminderTypeName: chain.reminderTypeName,
      daysUntilDeadline: daysBetween(today, definition.deadline),
      receivers: await this.resolveReceivers(definition),
      template: chain.template,
    };
  }

  private async resolveTemplate(
    definition: ReminderDefinition
  ): Promise<Pick<DueReminder, 'reminderTypeName' | 'template'> | null> {
    const { reminderId, reminderTypeId } = definition;

    const reminderType = await this.repository.findReminderType(reminderTypeId);
    if (!reminderType) {
      logger.warn(
        { code: ErrorCodes.DATA_INTEGRITY_GAP, reminderId, reminderTypeId },
        'Reminder type not found, skipping definition'
      );
      return null;
    }

    const template = await this.repository.findEmailTemplate(reminderType.emailTemplateId);
    if (!template) {
      logger.warn(
        {
          code: ErrorCodes.DATA_INTEGRITY_GAP,
          reminderId,
          reminderTypeId,
          templateId: reminderType.emailTemplateId,
        },
        'Email template not found, skipping definition'
      );
      return null;
    }

    return { reminderTypeName: reminderType.name, template };
  }

  /**
   * Missing memberships or client rows, and fetch failures, all give no receivers.
   */
  private async resolveReceivers(definition: ReminderDefinition): Promise<Client[]> {
    const { receiver, reminderId } = definition;
    try {
      const clientIds =
        receiver.type === 'group'
          ? await this.repository.findGroupClientIds(receiver.id)
          : [receiver.id];

      const uniqueIds = [...new Set(clientIds)];
      return uniqueIds.length ? await this.repository.findClientsByIds(uniqueIds) : [];
    } catch (error) {
      logger.error(
        {
          code: ErrorCodes.RECEIVER_RESOLUTION_FAILED,
          reminderId,
          receiver,
          error: errorMessage(error),
        },
        'Error resolving receivers, continuing without receivers'
      );
      return [];
    }
  }
}
