/**
 * Drive Migration Service
 *
 * Moves files from the odrive-mounted Amazon Cloud Drive tree to the rclone
 * remote. Placeholder files (`<name>.cloud`) are synced first and unsynced
 * again once copied, so local storage only holds one file at a time.
 *
 * Runs sequentially. A failed file is logged and the walk continues.
 */

import path from 'path';
import fs from 'fs-extra';
import type { Logger } from 'winston';
import { MigrationConfig } from '../../config/types.js';
import { ApplicationError } from '../../errors/index.js';
import { CommandRunner, runCommand } from '../../utils/processRunner.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { isDirectory, isFile } from '../../utils/fsChecks.js';

const CLOUD_PLACEHOLDER_SUFFIX = '.cloud';

export type FileMigrationOutcome =
  | { kind: 'migrated'; localPath: string; destination: string; synced: boolean }
  | { kind: 'outside-prefix'; localPath: string }
  | { kind: 'failed'; localPath: string; error: string };

export interface MigrationSummary {
  migrated: number;
  skipped: number;
  failed: number;
}

export type MigrationOutcome =
  | { kind: 'invalid-path'; path: string }
  | { kind: 'done'; summary: MigrationSummary };

export interface DriveMigrationOptions extends Omit<MigrationConfig, 'logName'> {
  runner?: CommandRunner;
}

export class DriveMigrationService {
  private readonly runner: CommandRunner;

  constructor(
    private readonly options: DriveMigrationOptions,
    private readonly logger: Logger
  ) {
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Migrate a file, or every file below a directory
   */
  async migrate(inputPath: string): Promise<MigrationOutcome> {
    const absolutePath = path.resolve(inputPath);
    const summary: MigrationSummary = { migrated: 0, skipped: 0, failed: 0 };
    if (await isFile(absolutePath)) {
      this.tally(summary, await this.handleFile(absolutePath));
    } else if (await isDirectory(absolutePath)) {
      await this.handleDir(absolutePath, summary);
    } else {
      return { kind: 'invalid-path', path: absolutePath };
    }

    this.logger.info('Migration finished', { path: absolutePath, ...summary });
    return { kind: 'done', summary };
  }

  async handleFile(inputPath: string): Promise<FileMigrationOutcome> {
    this.logger.info(`Handling file: ${inputPath}`);

    const synced = inputPath.endsWith(CLOUD_PLACEHOLDER_SUFFIX);
    const localPath = synced ? inputPath.slice(0, -CLOUD_PLACEHOLDER_SUFFIX.length) : inputPath;

    const prefixIndex = localPath.indexOf(this.options.acdPrefix);
    if (prefixIndex < 0) {
      this.logger.warn(`Path is outside ${this.options.acdPrefix}, skipping: ${localPath}`);
      return { kind: 'outside-prefix', localPath };
    }
    const destination = `${this.options.remote}:${localPath.slice(prefixIndex + this.options.acdPrefix.length)}`;

    try {
      if (synced) {
        this.logger.debug(`Syncing file: ${inputPath}`);
        await this.odrive('sync', inputPath);
      }

      try {
        this.logger.debug(`Copying file: ${localPath}`);
        await this.runner(this.options.rcloneBinary, ['copyto', localPath, destination]);
      } finally {
        // Unsync even when the copy failed so the placeholder comes back
        if (synced) {
          this.logger.debug(`Unsyncing file: ${localPath}`);
          await this.odrive('unsync', localPath);
        }
      }
    } catch (error) {
      if (!(error instanceof ApplicationError)) {
        throw error;
      }
      this.logger.error(`Failed to migrate file: ${localPath}`, createErrorLogContext(error));
      return { kind: 'failed', localPath, error: error.message };
    }

    return { kind: 'migrated', localPath, destination, synced };
  }

  private async handleDir(dirPath: string, summary: MigrationSummary): Promise<void> {
    this.logger.info(`Handling dir: ${dirPath}`);

    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    const names = (kind: 'file' | 'dir'): string[] =>
      entries
        .filter(entry => (kind === 'file' ? entry.isFile() : entry.isDirectory()))
        .map(entry => entry.name)
        .sort();

    for (const name of names('file')) {
      this.tally(summary, await this.handleFile(path.join(dirPath, name)));
    }
    for (const name of names('dir')) {
      await this.handleDir(path.join(dirPath, name), summary);
    }
  }

  private async odrive(command: 'sync' | 'unsync', target: string): Promise<void> {
    await this.runner(this.options.odrivePython, [this.options.odriveScript, command, target]);
  }

  private tally(summary: MigrationSummary, outcome: FileMigrationOutcome): void {
    switch (outcome.kind) {
      case 'migrated':
        summary.migrated++;
        break;
      case 'outside-prefix':
        summary.skipped++;
        break;
      case 'failed':
        summary.failed++;
        break;
    }
  }
}
