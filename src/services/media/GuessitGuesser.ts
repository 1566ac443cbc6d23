/**
 * GuessitGuesser
 *
 * Wraps the guessit CLI (`guessit --json <path>`) to turn a release-style
 * filename into title/year/season/episode fields. Output is validated with
 * zod and reduced to a MediaGuess; anything guessit adds beyond that is dropped.
 */

import { z } from 'zod';
import type { Logger } from 'winston';
import { MediaGuess, MediaGuesser } from '../../types/media.js';
import { CommandRunner, runCommand } from '../../utils/processRunner.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

// guessit reports multi-episode files ("S01E01E02") and multi-season packs as lists
const numberOrList = z.union([z.number().int(), z.array(z.number().int()).nonempty()]);

const guessitOutputSchema = z.object({
  title: z.union([z.string(), z.array(z.string()).nonempty()]).optional(),
  year: z.number().int().optional(),
  season: numberOrList.optional(),
  episode: numberOrList.optional(),
  type: z.string().optional(),
});

type GuessitOutput = z.infer<typeof guessitOutputSchema>;

export interface GuessitGuesserOptions {
  binary: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class GuessitGuesser implements MediaGuesser {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(private readonly logger: Logger, options: GuessitGuesserOptions) {
    this.binary = options.binary;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * @returns the guess, or null when guessit's output cannot be understood
   * @throws DependencyError / ProcessError when guessit itself cannot run
   */
  async guess(rawPath: string): Promise<MediaGuess | null> {
    const { stdout } = await this.runner(this.binary, ['--json', rawPath], {
      timeoutMs: this.timeoutMs,
    });

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (error) {
      this.logger.warn('guessit returned invalid JSON', { rawPath, error: getErrorMessage(error) });
      return null;
    }

    const parsed = guessitOutputSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('guessit output did not match the expected shape', {
        rawPath,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    return toMediaGuess(parsed.data);
  }
}

function firstNumber(value: number | number[] | undefined): number | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function firstString(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function toMediaGuess(output: GuessitOutput): MediaGuess {
  const guess: MediaGuess = {};
  const title = firstString(output.title);
  const season = firstNumber(output.season);
  const episode = firstNumber(output.episode);

  if (title !== undefined) guess.title = title;
  if (output.year !== undefined) guess.year = output.year;
  if (season !== undefined) guess.season = season;
  if (episode !== undefined) guess.episode = episode;
  if (output.type !== undefined) guess.type = output.type;

  return guess;
}
