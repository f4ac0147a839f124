import { connectDatabase, closeDatabase } from './config/database.js';
import { logger } from './utils/logger.js';
import { runReminderJob, type ReminderJobResult } from './jobs/reminderJob.js';

/**
 * 0 when every recipient was handled without an error, 1 otherwise
 */
export function exitCodeFor(result: Pick<ReminderJobResult, 'errorCount'>): number {
  return result.errorCount === 0 ? 0 : 1;
}

/**
 * One reminder pass against the configured database. Resolves to the process
 * exit code; a fatal error resolves to 1.
 */
export async function runCli(): Promise<number> {
  let exitCode = 1;

  try {
    logger.info('Starting reminder system');
    await connectDatabase();

    const result = await runReminderJob();
    exitCode = exitCodeFor(result);

    if (exitCode === 0) {
      logger.info('All reminders processed successfully');
    } else {
      logger.warn({ errorCount: result.errorCount }, `Completed with ${result.errorCount} errors`);
    }
  } catch (error) {
    logger.fatal({ error }, 'Fatal error in reminder system');
  } finally {
    await closeDatabase().catch((error: unknown) => {
      logger.error({ error }, 'Error closing database pool');
    });
  }

  return exitCode;
}
