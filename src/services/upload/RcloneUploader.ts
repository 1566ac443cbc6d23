import path from 'path';
import type { Logger } from 'winston';
import { SubtitleUploader, UploadRequest } from '../../types/subtitles.js';
import { CommandRunner, runCommand } from '../../utils/processRunner.js';

export interface RcloneUploaderOptions {
  binary: string;
  remote: string;
  /** Prefix inside the remote, may be empty */
  remotePath: string;
  runner?: CommandRunner;
}

/**
 * Uploads through `rclone copyto` to the remote that backs the library mount
 */
export class RcloneUploader implements SubtitleUploader {
  readonly name = 'rclone';
  private readonly runner: CommandRunner;

  constructor(
    private readonly options: RcloneUploaderOptions,
    private readonly logger: Logger
  ) {
    this.runner = options.runner ?? runCommand;
  }

  /**
   * `<remote>:<remotePath>/<relativePath>`, always with forward slashes
   */
  destinationFor(relativePath: string): string {
    const remotePath = path.posix.join(this.options.remotePath, relativePath.split(path.sep).join('/'));
    return `${this.options.remote}:${remotePath}`;
  }

  async upload(request: UploadRequest): Promise<void> {
    const destination = this.destinationFor(request.relativePath);
    const args = ['copyto', request.localPath, destination];

    this.logger.debug('Running rclone', { args });
    await this.runner(this.options.binary, args);
  }
}
