import type { Logger } from 'winston';
import { UploadConfig } from '../../config/types.js';
import { SubtitleUploader } from '../../types/subtitles.js';
import { CommandRunner } from '../../utils/processRunner.js';
import { LibraryUploader } from './LibraryUploader.js';
import { RcloneUploader } from './RcloneUploader.js';

export { LibraryUploader } from './LibraryUploader.js';
export { RcloneUploader } from './RcloneUploader.js';

export function createUploader(config: UploadConfig, logger: Logger, runner?: CommandRunner): SubtitleUploader {
  switch (config.mode) {
    case 'library':
      return new LibraryUploader(logger);
    case 'rclone':
      return new RcloneUploader(
        {
          binary: config.rcloneBinary,
          remote: config.remote,
          remotePath: config.remotePath,
          ...(runner && { runner }),
        },
        logger
      );
  }
}
