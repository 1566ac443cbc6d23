import fs from 'fs-extra';
import readline from 'readline';
import type { Logger } from 'winston';
import { ConfigurationError } from '../../errors/index.js';
import { BoundedDeque } from '../../utils/BoundedDeque.js';
import { isFile } from '../../utils/fsChecks.js';

/**
 * Reads the newest entries of the original-names log.
 *
 * The log is append-only (oldest first on disk, one absolute path per line).
 * Lines are streamed top to bottom into a bounded deque so memory stays
 * proportional to `limit`, not to the size of the log.
 */
export class LogWindowReader {
  constructor(private readonly logger: Logger) {}

  /**
   * @param limit - newest entries to keep; null/0 returns the whole log
   * @returns entries newest first
   * @throws ConfigurationError when the log file does not exist
   */
  async readWindow(logPath: string, limit: number | null): Promise<string[]> {
    if (!(await isFile(logPath))) {
      throw new ConfigurationError(
        'history.originalNamesLog',
        `Couldn't read original names file (${logPath})! Stopping...`
      );
    }

    const window = new BoundedDeque<string>(limit && limit > 0 ? limit : null);
    const input = fs.createReadStream(logPath, { encoding: 'utf8' });
    const lines = readline.createInterface({ input, crlfDelay: Infinity });

    let total = 0;
    for await (const line of lines) {
      const entry = line.trim();
      if (!entry) {
        continue;
      }
      total++;
      window.pushFront(entry);
    }

    this.logger.debug('Read original names log', {
      logPath,
      totalEntries: total,
      windowSize: window.size,
      limit,
    });

    return window.toArray();
  }
}
