import cron, { ScheduledTask } from 'node-cron';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { sendStockReport } from '../utils/stockReportMailer';

/**
 * Stock Report Job
 * Emails the low-stock report to admins and managers on REPORT_CRON
 * (default: daily at 8 AM).
 */
export const runStockReportJob = async (): Promise<void> => {
  logger.info('Starting stock report job...');

  try {
    const outcome = await sendStockReport();
    logger.info('Stock report job completed', { outcome });
  } catch (error) {
    logger.error('Stock report job failed', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
};

export function startStockReportJob(): ScheduledTask | null {
  if (!env.REPORT_JOB_ENABLED) {
    logger.info('Stock report job disabled');
    return null;
  }

  if (!cron.validate(env.REPORT_CRON)) {
    throw new Error(`Invalid REPORT_CRON expression: ${env.REPORT_CRON}`);
  }

  const task = cron.schedule(env.REPORT_CRON, runStockReportJob);

  logger.info('Stock report job scheduled', { cron: env.REPORT_CRON });
  return task;
}
