import fs from 'fs-extra';
import { z } from 'zod';
import type { Logger } from 'winston';
import { ShowNameNormalizer } from '../../types/media.js';
import { ConfigurationError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

const aliasFileSchema = z.record(z.string().min(1), z.string().min(1));

/**
 * Maps localized or alternate show titles to the name the TV library uses.
 *
 * The alias file is a flat JSON object: { "alternate title": "Library Title" }.
 * Lookups ignore case and repeated whitespace; unknown titles pass through.
 */
export class ShowNameFormatter implements ShowNameNormalizer {
  private readonly aliases = new Map<string, string>();

  constructor(aliases: Record<string, string> = {}) {
    for (const [alias, title] of Object.entries(aliases)) {
      this.aliases.set(normalizeKey(alias), title);
    }
  }

  /**
   * Load the alias table. A missing path yields a pass-through formatter.
   * @throws ConfigurationError when the file exists but is not a valid alias table
   */
  static async fromFile(filePath: string | undefined, logger: Logger): Promise<ShowNameFormatter> {
    if (!filePath) {
      return new ShowNameFormatter();
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(filePath);
    } catch (error) {
      throw new ConfigurationError(
        'subtitles.showAliasesPath',
        `Couldn't load show aliases from ${filePath}: ${getErrorMessage(error)}`
      );
    }

    const parsed = aliasFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        'subtitles.showAliasesPath',
        `Show aliases file ${filePath} must be an object of non-empty strings`
      );
    }

    const formatter = new ShowNameFormatter(parsed.data);
    logger.debug('Loaded show aliases', { filePath, count: formatter.size });
    return formatter;
  }

  get size(): number {
    return this.aliases.size;
  }

  format(title: string): string {
    return this.aliases.get(normalizeKey(title)) ?? title;
  }
}

function normalizeKey(title: string): string {
  return title.trim().replace(/\s+/g, ' ').toLowerCase();
}
