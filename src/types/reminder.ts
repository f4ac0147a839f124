/**
 * Reminder Types
 * Reference data read by the daily reminder job and the rows it writes back
 */

import type { IsoDate } from '../utils/dates.js';

export type ReceiverType = 'individual' | 'group';

export type DeliveryStatus = 'sent' | 'error' | 'blocked' | 'unsubscribed';

export interface Receiver {
  type: ReceiverType;
  /** Client id for `individual`, group id for `group` */
  id: number;
}

export interface ReminderDefinition {
  reminderId: number;
  reminderTypeId: number;
  deadline: IsoDate;
  /** Days before the deadline at which each stage fires; stage index = position */
  daysBeforeDeadline: number[];
  receiver: Receiver;
}

export interface Client {
  id: number;
  firstName: string | null;
  lastName: string | null;
  middleName: string | null;
  companyName: string | null;
  companyType: string | null;
  email: string | null;
  mobile: string | null;
  gstNo: string | null;
  address: string | null;
}

export interface ReminderType {
  reminderTypeId: number;
  name: string;
  emailTemplateId: number;
}

export interface EmailTemplate {
  templateId: number;
  name: string;
  subject: string;
  body: string;
  externalReferenceInfo: string | null;
  dataReferences: string[];
}

/**
 * A definition due today, with its receivers and template resolved
 */
export interface DueReminder {
  definition: ReminderDefinition;
  reminderTypeName: string;
  daysUntilDeadline: number;
  receivers: Client[];
  template: EmailTemplate;
}

export interface DeliveryStatusRecord {
  reminderId: number;
  clientId: number;
  status: DeliveryStatus;
  errorMessage: string | null;
}

export interface DispatchSummary {
  successCount: number;
  errorCount: number;
}
