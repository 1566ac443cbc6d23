import fs from 'fs-extra';
import type { Logger } from 'winston';
import { SubtitleUploader, UploadRequest } from '../../types/subtitles.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { toError } from '../../utils/errorHandling.js';

/**
 * Copies the scratch file straight into a locally mounted library
 */
export class LibraryUploader implements SubtitleUploader {
  readonly name = 'library';

  constructor(private readonly logger: Logger) {}

  async upload(request: UploadRequest): Promise<void> {
    try {
      await fs.copy(request.localPath, request.libraryPath, { overwrite: true });
    } catch (error) {
      throw new FileSystemError(
        `Failed to copy subtitle into library: ${request.libraryPath}`,
        ErrorCode.FS_WRITE_FAILED,
        request.libraryPath,
        false,
        { service: 'LibraryUploader', operation: 'upload', metadata: { source: request.localPath } },
        toError(error)
      );
    }
    this.logger.debug('Copied subtitle into library', {
      source: request.localPath,
      destination: request.libraryPath,
    });
  }
}
