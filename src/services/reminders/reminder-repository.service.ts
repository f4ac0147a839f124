import { z } from 'zod';
import { db as defaultDb, type DatabaseService } from '../database.js';
import { logger } from '../../utils/logger.js';
import { ErrorCodes } from '../../utils/errors.js';
import { isIsoDate, type IsoDate } from '../../utils/dates.js';
import type {
  Client,
  DeliveryStatusRecord,
  EmailTemplate,
  ReminderDefinition,
  ReminderType,
} from '../../types/reminder.js';

/**
 * Query primitives the reminder job needs from the backing store
 */
export interface ReminderRepository {
  findDefinitionsWithDeadlineFrom(date: IsoDate): Promise<ReminderDefinition[]>;
  findGroupClientIds(groupId: number): Promise<number[]>;
  findClientsByIds(clientIds: number[]): Promise<Client[]>;
  findReminderType(reminderTypeId: number): Promise<ReminderType | null>;
  findEmailTemplate(templateId: number): Promise<EmailTemplate | null>;
  countSentStatuses(reminderId: number, clientId: number): Promise<number>;
  isBlocklisted(clientId: number): Promise<boolean>;
  isUnsubscribed(reminderId: number, clientId: number): Promise<boolean>;
  insertStatuses(records: DeliveryStatusRecord[]): Promise<void>;
}

// ============================================
// ROW SCHEMAS
// ============================================

// BIGINT columns come back from pg as strings
const bigintId = z.coerce.number().int().positive();

export const reminderDefinitionRowSchema = z.object({
  reminder_id: bigintId,
  reminder_type_id: bigintId,
  deadline: z.string().refine(isIsoDate, 'deadline must be a YYYY-MM-DD date'),
  days_before_deadline: z.array(z.coerce.number().int().nonnegative()),
  receiver_type: z.enum(['individual', 'group']),
  receiver_id: bigintId,
});

interface ClientRow {
  id: string;
  first_name: string | null;
  last_name: string | null;
  middle_name: string | null;
  company_name: string | null;
  company_type: string | null;
  email: string | null;
  mobile: string | null;
  gst_no: string | null;
  address: string | null;
}

interface ReminderTypeRow {
  reminder_type_id: string;
  name: string;
  email_template_id: string;
}

interface EmailTemplateRow {
  template_id: string;
  name: string;
  subject: string | null;
  body: string | null;
  external_reference_info: string | null;
  data_references: string[] | null;
}

/**
 * Validate a reminder_info row; invalid rows are a data-integrity gap and yield null
 */
export function parseReminderDefinitionRow(row: unknown): ReminderDefinition | null {
  const parsed = reminderDefinitionRowSchema.safeParse(row);
  if (!parsed.success) {
    logger.warn(
      { code: ErrorCodes.INVALID_REMINDER_ROW, issues: parsed.error.flatten().fieldErrors, row },
      'Skipping invalid reminder definition'
    );
    return null;
  }

  const data = parsed.data;
  return {
    reminderId: data.reminder_id,
    reminderTypeId: data.reminder_type_id,
    deadline: data.deadline,
    daysBeforeDeadline: data.days_before_deadline,
    receiver: { type: data.receiver_type, id: data.receiver_id },
  };
}

export function mapClientRow(row: ClientRow): Client {
  return {
    id: Number(row.id),
    firstName: row.first_name,
    lastName: row.last_name,
    middleName: row.middle_name,
    companyName: row.company_name,
    companyType: row.company_type,
    email: row.email,
    mobile: row.mobile,
    gstNo: row.gst_no,
    address: row.address,
  };
}

// ============================================
// POSTGRES IMPLEMENTATION
// ============================================

export class PgReminderRepository implements ReminderRepository {
  constructor(private readonly db: DatabaseService = defaultDb) {}

  async findDefinitionsWithDeadlineFrom(date: IsoDate): Promise<ReminderDefinition[]> {
    const rows = await this.db.queryMany(
      `SELECT reminder_id, reminder_type_id, deadline::text AS deadline,
              days_before_deadline, receiver_type, receiver_id
         FROM reminder_info
        WHERE deadline >= $1::date
        ORDER BY reminder_id`,
      [date]
    );

    return rows
      .map(parseReminderDefinitionRow)
      .filter((definition): definition is ReminderDefinition => definition !== null);
  }

  async findGroupClientIds(groupId: number): Promise<number[]> {
    const rows = await this.db.queryMany<{ client_id: string }>(
      `SELECT client_id FROM client_group_map WHERE group_id = $1 AND client_id IS NOT NULL`,
      [groupId]
    );
    return rows.map((row) => Number(row.client_id));
  }

  async findClientsByIds(clientIds: number[]): Promise<Client[]> {
    if (clientIds.length === 0) return [];

    const rows = await this.db.queryMany<ClientRow>(
      `SELECT id, first_name, last_name, middle_name, company_name, company_type,
              email, mobile::text AS mobile, gst_no, address
         FROM clients
        WHERE id = ANY($1::bigint[])
        ORDER BY id`,
      [clientIds]
    );
    return rows.map(mapClientRow);
  }

  async findReminderType(reminderTypeId: number): Promise<ReminderType | null> {
    const row = await this.db.queryOne<ReminderTypeRow>(
      `SELECT reminder_type_id, name, email_template_id
         FROM reminder_type_info
        WHERE reminder_type_id = $1`,
      [reminderTypeId]
    );
    if (!row) return null;

    return {
      reminderTypeId: Number(row.reminder_type_id),
      name: row.name,
      emailTemplateId: Number(row.email_template_id),
    };
  }

  async findEmailTemplate(templateId: number): Promise<EmailTemplate | null> {
    const row = await this.db.queryOne<EmailTemplateRow>(
      `SELECT template_id, name, subject, body, external_reference_info, data_references
         FROM email_template
        WHERE template_id = $1`,
      [templateId]
    );
    if (!row) return null;

    return {
      templateId: Number(row.template_id),
      name: row.name,
      subject: row.subject ?? '',
      body: row.body ?? '',
      externalReferenceInfo: row.external_reference_info,
      dataReferences: row.data_references ?? [],
    };
  }

  async countSentStatuses(reminderId: number, clientId: number): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(
      `SELECT COUNT(*)::int AS count
         FROM reminder_status
        WHERE reminder_id = $1 AND client_id = $2 AND status = 'sent'`,
      [reminderId, clientId]
    );
    return row?.count ?? 0;
  }

  async isBlocklisted(clientId: number): Promise<boolean> {
    const row = await this.db.queryOne<{ found: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM reminder_blocklist WHERE client_id = $1) AS found`,
      [clientId]
    );
    return row?.found === true;
  }

  async isUnsubscribed(reminderId: number, clientId: number): Promise<boolean> {
    const row = await this.db.queryOne<{ found: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM reminder_unsubscribers WHERE reminder_id = $1 AND client_id = $2
       ) AS found`,
      [reminderId, clientId]
    );
    return row?.found === true;
  }

  async insertStatuses(records: DeliveryStatusRecord[]): Promise<void> {
    if (records.length === 0) return;

    const params: unknown[] = [];
    const values = records.map((record, i) => {
      params.push(record.reminderId, record.clientId, record.status, record.errorMessage);
      const base = i * 4;
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`;
    });

    await this.db.query(
      `INSERT INTO reminder_status (reminder_id, client_id, status, error_message)
       VALUES ${values.join(', ')}`,
      params
    );
  }
}
