#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { App } from './app.js';
import { defaultConfig } from './config/defaults.js';
import { createLogger } from './logging/logger.js';
import { createErrorLogContext } from './utils/errorHandling.js';

// Console-only logger for failures that happen before a run has its own
const fatalLogger = createLogger(
  { ...defaultConfig.logging, file: { ...defaultConfig.logging.file, enabled: false } },
  { name: 'subtitle-monitor' }
);

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Expected zero (no limit) or a positive integer.');
  }
  return limit;
}

async function withApp<T>(run: (app: App) => Promise<T>): Promise<T> {
  const app = new App();
  try {
    return await run(app);
  } finally {
    await app.close();
  }
}

const program = new Command();

program
  .name('subtitle-monitor')
  .description('Fill missing subtitle sidecars for recently organized videos')
  .version('1.0.0');

program
  .command('monitor', { isDefault: true })
  .description('Check the newest entries of the original names log for missing subtitles')
  .option('-l, --limit <n>', 'newest entries to check (0 = whole log)', parseLimit)
  .action(async (options: { limit?: number }) => {
    await withApp(app => app.runMonitor(options.limit !== undefined ? { limit: options.limit } : {}));
  });

program
  .command('migrate')
  .description('Copy a file or directory from the odrive mount to the rclone remote')
  .argument('[paths...]', 'exactly one file or directory')
  .action(async (paths: string[]) => {
    const result = await withApp(app => app.runMigration(paths));
    if (result.kind === 'usage') {
      console.log('Usage: subtitle-monitor migrate <INPUT_PATH>');
    } else if (result.kind === 'invalid-path') {
      console.log('Invalid input path given. Stopping!');
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fatalLogger.error('Subtitle monitor stopped', createErrorLogContext(error));
  process.exit(1);
});
