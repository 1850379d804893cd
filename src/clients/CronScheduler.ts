import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { BackupError, ConfigurationError, formatError, toError } from '../errors';

/**
 * CronScheduler implementation using node-cron.
 * Runs one backup per tick and skips ticks that arrive while a backup is still running.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private logger: Logger;
  private isBackupRunning = false;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new ConfigurationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        'BACKUP_SCHEDULE'
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${timezone})`
    );

    this.task = cron.schedule(
      this.config.cronExpression,
      () => {
        this.logger.logScheduledExecution(this.config.cronExpression);
        return this.runBackup();
      },
      {
        scheduled: false, // Don't start immediately
        timezone,
      }
    );
    this.task.start();

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        void this.runBackup();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  isBackupInProgress(): boolean {
    return this.isBackupRunning;
  }

  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', toError(error));
      return false;
    }
  }

  /**
   * Run one scheduled backup. A failed run is logged and the schedule keeps going;
   * the next tick is the retry.
   */
  async runBackup(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    const startTime = Date.now();

    try {
      const result = await this.backupManager.executeBackup();
      this.logger.info(
        `Scheduled backup completed in ${result.duration}ms. ${result.retainedCount} backups retained.`,
        { runId: result.runId, location: result.location }
      );
    } catch (error) {
      const stage = error instanceof BackupError ? error.stage : 'unknown';
      this.logger.logBackupError(stage, toError(error) ?? new Error(formatError(error)), {
        duration: Date.now() - startTime,
        cronExpression: this.config.cronExpression,
      });
    } finally {
      this.isBackupRunning = false;
    }
  }
}
