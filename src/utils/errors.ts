/**
 * Reminder Mailer - Error Handling Utilities
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  // Reference data
  DATA_INTEGRITY_GAP: 'DATA_INTEGRITY_GAP',
  INVALID_REMINDER_ROW: 'INVALID_REMINDER_ROW',

  // Collaborator failures
  REMINDER_FETCH_FAILED: 'REMINDER_FETCH_FAILED',
  RECEIVER_RESOLUTION_FAILED: 'RECEIVER_RESOLUTION_FAILED',
  SUPPRESSION_CHECK_FAILED: 'SUPPRESSION_CHECK_FAILED',
  STATUS_WRITE_FAILED: 'STATUS_WRITE_FAILED',
  MAIL_SEND_FAILED: 'MAIL_SEND_FAILED',

  // Dispatch
  RECIPIENT_PROCESSING_FAILED: 'RECIPIENT_PROCESSING_FAILED',
} as const;

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Non-2xx response from the mail API
 */
export class MailApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = 'MailApiError';
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
