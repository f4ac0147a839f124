import type { Client, DueReminder } from '../../types/reminder.js';

export type TemplateFields = Readonly<Record<string, string>>;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Substitute `{{ name }}` placeholders; names missing from `fields` render as ''.
 */
export function renderTemplate(template: string, fields: TemplateFields): string {
  return template.replace(PLACEHOLDER, (_match, name: string) =>
    Object.prototype.hasOwnProperty.call(fields, name) ? fields[name] : ''
  );
}

export function fullName(client: Client): string {
  return [client.firstName, client.middleName, client.lastName]
    .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
    .map((part) => part.trim())
    .join(' ');
}

/**
 * Field map exposed to reminder templates: reminder fields, client fields and
 * the computed days until the deadline.
 */
export function buildTemplateFields(reminder: DueReminder, client: Client): TemplateFields {
  const { definition } = reminder;

  return {
    reminder_id: String(definition.reminderId),
    reminder_type_id: String(definition.reminderTypeId),
    reminder_type_name: reminder.reminderTypeName,
    deadline: definition.deadline,
    days_before_deadline: definition.daysBeforeDeadline.join(', '),
    days_until_deadline: String(reminder.daysUntilDeadline),
    template_name: reminder.template.name,
    client_id: String(client.id),
    first_name: client.firstName ?? '',
    middle_name: client.middleName ?? '',
    last_name: client.lastName ?? '',
    full_name: fullName(client),
    company_name: client.companyName ?? '',
    company_type: client.companyType ?? '',
    email: client.email ?? '',
    mobile: client.mobile ?? '',
    gst_no: client.gstNo ?? '',
    address: client.address ?? '',
  };
}

export interface RenderedEmail {
  subject: string;
  body: string;
}

export function personalizeEmail(reminder: DueReminder, client: Client): RenderedEmail {
  const fields = buildTemplateFields(reminder, client);
  return {
    subject: renderTemplate(reminder.template.subject, fields),
    body: renderTemplate(reminder.template.body, fields),
  };
}
