/**
 * Resend API Client
 *
 * Sends single and batched HTML emails through the Resend REST API.
 * Any non-2xx response or network failure becomes a failed result; callers
 * never see provider error codes beyond the extracted message.
 */

import { logger } from '../../utils/logger.js';
import { MailApiError, errorMessage } from '../../utils/errors.js';

// ============================================
// TYPES
// ============================================

export interface OutboundEmail {
  toEmail: string;
  toName: string;
  subject: string;
  html: string;
}

export type MailSendResult =
  | { success: true; messageIds: string[] }
  | { success: false; error: string; statusCode?: number };

/**
 * Mail-send collaborator used by the dispatcher
 */
export interface MailSender {
  sendEmail(email: OutboundEmail): Promise<MailSendResult>;
  sendBatch(emails: OutboundEmail[]): Promise<MailSendResult>;
}

export interface ResendClientConfig {
  apiKey: string;
  fromEmail: string;
  fromName: string;
  baseUrl: string;
}

interface ResendEmailPayload {
  from: string;
  to: string[];
  subject: string;
  html: string;
}

// ============================================
// CLIENT
// ============================================

export class ResendClient implements MailSender {
  private readonly baseUrl: string;
  private readonly from: string;

  constructor(private readonly config: ResendClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.from = `${config.fromName} <${config.fromEmail}>`;
  }

  async sendEmail(email: OutboundEmail): Promise<MailSendResult> {
    try {
      const data = await this.post('/emails', this.toPayload(email));
      return { success: true, messageIds: extractIds(data) };
    } catch (error) {
      return this.failure(error, { to: email.toEmail });
    }
  }

  async sendBatch(emails: OutboundEmail[]): Promise<MailSendResult> {
    if (emails.length === 0) {
      return { success: true, messageIds: [] };
    }

    try {
      const data = await this.post(
        '/emails/batch',
        emails.map((email) => this.toPayload(email))
      );
      return { success: true, messageIds: extractIds(data) };
    } catch (error) {
      return this.failure(error, { batchSize: emails.length });
    }
  }

  private toPayload(email: OutboundEmail): ResendEmailPayload {
    return {
      from: this.from,
      to: [email.toEmail],
      subject: email.subject,
      html: email.html,
    };
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    const data: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      throw new MailApiError(
        `HTTP ${response.status}: ${extractErrorText(data) ?? response.statusText}`,
        response.status,
        response.status === 429 || response.status >= 500
      );
    }

    return data;
  }

  private failure(error: unknown, context: Record<string, unknown>): MailSendResult {
    const message = errorMessage(error);
    const statusCode = error instanceof MailApiError ? error.statusCode : undefined;
    const retryable = error instanceof MailApiError ? error.retryable : true;

    logger.error({ ...context, error: message, statusCode, retryable }, 'Resend API request failed');

    return { success: false, error: message, statusCode };
  }
}

// ============================================
// RESPONSE HELPERS
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Single sends answer `{ id }`, batch sends `{ data: [{ id }] }`
 */
export function extractIds(data: unknown): string[] {
  if (!isRecord(data)) return [];
  if (typeof data.id === 'string') return [data.id];
  if (Array.isArray(data.data)) {
    return data.data
      .map((item: unknown) => (isRecord(item) && typeof item.id === 'string' ? item.id : null))
      .filter((id): id is string => id !== null);
  }
  return [];
}

export function extractErrorText(data: unknown): string | null {
  if (!isRecord(data)) return null;
  if (typeof data.message === 'string' && data.message) return data.message;
  if (typeof data.error === 'string' && data.error) return data.error;
  return null;
}
