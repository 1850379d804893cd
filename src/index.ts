#!/usr/bin/env node
import { ConfigurationManager } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { PostgreSQLClient } from './clients/PostgreSQLClient';
import { GzipCompressor } from './clients/Compressor';
import { RetentionManager } from './clients/RetentionManager';
import { createStorageClient } from './clients/createStorageClient';
import { resolveConnectionSpec, describeConnection } from './clients/ConnectionStringParser';
import { BackupConfig } from './interfaces/BackupConfig';
import { BackupResult } from './interfaces/BackupManager';
import { Logger as ILogger, LogLevel } from './interfaces/Logger';
import { BackupError, BackupStage, formatError, toError } from './errors';

const EXIT_CODES: Record<BackupStage, number> = {
  configuration: 1,
  connection_string: 2,
  credentials: 3,
  connectivity: 4,
  dump: 5,
  compression: 6,
  upload: 7,
  filesystem: 8,
};

const UNEXPECTED_ERROR_EXIT_CODE = 9;

// 128 + signal number
const SIGNAL_EXIT_CODES = {
  SIGTERM: 143,
  SIGINT: 130,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_EXIT_CODES;

/**
 * Process exit code for a fatal error, one per failing stage
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof BackupError) {
    return EXIT_CODES[error.stage];
  }
  return UNEXPECTED_ERROR_EXIT_CODE;
}

/**
 * Wire every component for the given configuration
 */
export function createBackupManager(config: BackupConfig, logger: ILogger): BackupManager {
  const connection = resolveConnectionSpec(config);
  logger.info(`Backing up ${describeConnection(connection)}`);

  return new BackupManager(config, {
    postgresClient: new PostgreSQLClient(connection, logger),
    compressor: new GzipCompressor(logger),
    storageClient: createStorageClient(config, logger),
    retentionManager: new RetentionManager(
      config.backupDir,
      { maxRetained: config.maxBackups },
      logger
    ),
    logger,
  });
}

/**
 * Main application class: loads configuration, then either runs a single backup or keeps
 * running them on the configured cron schedule
 */
class PostgreSQLBackupApplication {
  private createLogger: (level: LogLevel) => ILogger;
  private logger: ILogger;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;
  private singleRunInProgress = false;

  constructor(createLogger: (level: LogLevel) => ILogger = level => new Logger(level)) {
    // Reconfigured with LOG_LEVEL once the configuration is loaded
    this.createLogger = createLogger;
    this.logger = createLogger(LogLevel.INFO);
  }

  /**
   * Run the application. Resolves with the exit code in single-run mode and with null
   * once the scheduler is running.
   */
  async run(env: NodeJS.ProcessEnv = process.env): Promise<number | null> {
    try {
      const config = ConfigurationManager.loadConfiguration(env);
      this.logger = this.createLogger(config.logLevel);
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const backupManager = createBackupManager(config, this.logger);

      if (config.schedule) {
        await this.startScheduler(config.schedule, config, backupManager);
        return null;
      }

      const result = await this.runOnce(backupManager);
      this.logger.info(
        `Backup management complete. ${result.retainedCount} backups retained.`,
        { runId: result.runId, location: result.location }
      );
      return 0;
    } catch (error) {
      this.reportFatal(error);
      return exitCodeFor(error);
    }
  }

  /**
   * Whether a backup is running, in single-run mode or on a scheduler tick
   */
  isBackupInProgress(): boolean {
    return this.singleRunInProgress || (this.cronScheduler?.isBackupInProgress() ?? false);
  }

  /**
   * Exit code for a shutdown signal: 0 when idle, 128 + signal number when a backup is
   * aborted
   */
  exitCodeForSignal(signal: ShutdownSignal): number {
    return this.isBackupInProgress() ? SIGNAL_EXIT_CODES[signal] : 0;
  }

  /**
   * Stop the scheduler, if any
   */
  shutdown(): void {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }
  }

  /**
   * Shut down and exit. An interrupted backup exits non-zero so the caller does not
   * record it as a success.
   */
  handleSignal(signal: ShutdownSignal): void {
    const exitCode = this.exitCodeForSignal(signal);
    if (exitCode === 0) {
      this.logger.info(`Received ${signal}, shutting down`);
    } else {
      this.logger.error(`Received ${signal} during a backup run, aborting`);
    }
    this.shutdown();
    process.exit(exitCode);
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals: ShutdownSignal[] = ['SIGTERM', 'SIGINT'];

    signals.forEach(signal => {
      process.on(signal, () => this.handleSignal(signal));
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason) ?? new Error(String(reason)));
      this.shutdown();
      process.exit(UNEXPECTED_ERROR_EXIT_CODE);
    });
  }

  private async runOnce(backupManager: BackupManager): Promise<BackupResult> {
    this.singleRunInProgress = true;
    try {
      return await backupManager.executeBackup();
    } finally {
      this.singleRunInProgress = false;
    }
  }

  private async startScheduler(
    schedule: string,
    config: BackupConfig,
    backupManager: BackupManager
  ): Promise<void> {
    this.logger.info('Validating configuration and testing connections...');
    const isValid = await backupManager.validateConfiguration();
    if (!isValid) {
      throw new BackupError('Database or storage destination is unreachable', 'connectivity');
    }

    this.cronScheduler = new CronScheduler(
      {
        cronExpression: schedule,
        timezone: config.timezone,
        runOnInit: config.runOnStart,
      },
      backupManager,
      this.logger
    );
    this.cronScheduler.start();
    this.logger.info('Service is now running and will execute backups on the configured schedule');
  }

  private reportFatal(error: unknown): void {
    if (error instanceof BackupError) {
      this.logger.logBackupError(error.stage, error);
    } else {
      this.logger.error(`Unexpected error: ${formatError(error)}`, toError(error));
    }
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new PostgreSQLBackupApplication();
  app.setupSignalHandlers();

  const exitCode = await app.run();
  if (exitCode !== null) {
    process.exit(exitCode);
  }
}

// Export for testing
export { PostgreSQLBackupApplication, main };

// Start the application
if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error starting application:', error);
    process.exit(UNEXPECTED_ERROR_EXIT_CODE);
  });
}
