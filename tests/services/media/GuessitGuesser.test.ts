import { GuessitGuesser } from '../../../src/services/media/GuessitGuesser.js';
import { DependencyError } from '../../../src/errors/index.js';
import { createFakeRunner } from '../../helpers/runner.js';
import { createTestLogger, flushLogs } from '../../helpers/logger.js';

describe('GuessitGuesser', () => {
  it('should run guessit with --json and the raw path as one argument', async () => {
    const { runner, calls } = createFakeRunner(() => ({
      stdout: JSON.stringify({ title: 'Some Movie', year: 2019, type: 'movie', container: 'mkv' }),
      stderr: '',
    }));
    const guesser = new GuessitGuesser(createTestLogger().logger, {
      binary: '/usr/local/bin/guessit',
      timeoutMs: 5000,
      runner,
    });

    const guess = await guesser.guess('/in/Some "Movie" $HOME 2019.mkv');

    expect(guess).toEqual({ title: 'Some Movie', year: 2019, type: 'movie' });
    expect(calls).toEqual([
      {
        command: '/usr/local/bin/guessit',
        args: ['--json', '/in/Some "Movie" $HOME 2019.mkv'],
        options: { timeoutMs: 5000 },
      },
    ]);
  });

  it('should take the first value of multi-episode lists', async () => {
    const { runner } = createFakeRunner(() => ({
      stdout: JSON.stringify({ title: ['Show', 'Alt'], season: 2, episode: [3, 4], type: 'episode' }),
      stderr: '',
    }));
    const guesser = new GuessitGuesser(createTestLogger().logger, { binary: 'guessit', runner });

    await expect(guesser.guess('/in/Show.S02E03E04.mkv')).resolves.toEqual({
      title: 'Show',
      season: 2,
      episode: 3,
      type: 'episode',
    });
  });

  it('should return null and warn on invalid JSON', async () => {
    const { runner } = createFakeRunner(() => ({ stdout: 'not json', stderr: '' }));
    const testLogger = createTestLogger();
    const guesser = new GuessitGuesser(testLogger.logger, { binary: 'guessit', runner });

    await expect(guesser.guess('/in/x.mkv')).resolves.toBeNull();
    await flushLogs();
    expect(testLogger.messages('warn')).toEqual(['guessit returned invalid JSON']);
  });

  it('should return null when the output has the wrong shape', async () => {
    const { runner } = createFakeRunner(() => ({
      stdout: JSON.stringify({ title: 'Show', season: 'one' }),
      stderr: '',
    }));
    const testLogger = createTestLogger();
    const guesser = new GuessitGuesser(testLogger.logger, { binary: 'guessit', runner });

    await expect(guesser.guess('/in/x.mkv')).resolves.toBeNull();
    await flushLogs();
    expect(testLogger.messages('warn')).toEqual(['guessit output did not match the expected shape']);
  });

  it('should let process failures propagate', async () => {
    const { runner } = createFakeRunner(() => {
      throw new DependencyError('guessit', 'Executable not found: guessit');
    });
    const guesser = new GuessitGuesser(createTestLogger().logger, { binary: 'guessit', runner });

    await expect(guesser.guess('/in/x.mkv')).rejects.toBeInstanceOf(DependencyError);
  });
});
