import { MediaPathReconstructor } from '../../../src/services/media/MediaPathReconstructor.js';
import { ShowNameFormatter } from '../../../src/services/media/ShowNameFormatter.js';
import { LibraryConfig } from '../../../src/config/types.js';
import { MediaGuess } from '../../../src/types/media.js';
import { FakeGuesser } from '../../helpers/fakes.js';
import { createTestLogger } from '../../helpers/logger.js';

const layout: LibraryConfig = { rootPath: '/lib', moviesPath: 'Movies', tvPath: 'TV' };

function createReconstructor(
  guesses: Record<string, MediaGuess | null>,
  aliases: Record<string, string> = {}
): MediaPathReconstructor {
  return new MediaPathReconstructor(
    new FakeGuesser(guesses),
    new ShowNameFormatter(aliases),
    layout,
    createTestLogger().logger
  );
}

describe('MediaPathReconstructor', () => {
  it('should place a movie under its title-cased folder', async () => {
    const reconstructor = createReconstructor({
      '/in/some.movie.2019.1080p.mkv': { title: 'some movie', year: 2019, type: 'movie' },
    });

    await expect(reconstructor.reconstruct('/in/some.movie.2019.1080p.mkv')).resolves.toEqual({
      status: 'ok',
      descriptor: { kind: 'movie', title: 'Some Movie', year: 2019, extension: '.mkv' },
      canonicalPath: '/lib/Movies/Some Movie (2019)/Some Movie (2019).mkv',
    });
  });

  it('should place an episode under its show and zero-padded season', async () => {
    const reconstructor = createReconstructor({
      '/in/Show.Name.S01E05.mp4': { title: 'Show Name', season: 1, episode: 5, type: 'episode' },
    });

    await expect(reconstructor.reconstruct('/in/Show.Name.S01E05.mp4')).resolves.toEqual({
      status: 'ok',
      descriptor: { kind: 'episode', title: 'Show Name', season: 1, episode: 5, extension: '.mp4' },
      canonicalPath: '/lib/TV/Show Name/Season 01/Show Name - S01E05.mp4',
    });
  });

  it('should keep numbers wider than two digits', async () => {
    const reconstructor = createReconstructor({
      '/in/long.show.mkv': { title: 'Long Show', season: 12, episode: 104 },
    });

    const result = await reconstructor.reconstruct('/in/long.show.mkv');
    expect(result).toMatchObject({
      status: 'ok',
      canonicalPath: '/lib/TV/Long Show/Season 12/Long Show - S12E104.mkv',
    });
  });

  it('should normalize show titles through the alias table', async () => {
    const reconstructor = createReconstructor(
      { '/in/hashoter.s02e03.mkv': { title: 'hashoter', season: 2, episode: 3 } },
      { Hashoter: 'The Cop' }
    );

    const result = await reconstructor.reconstruct('/in/hashoter.s02e03.mkv');
    expect(result).toMatchObject({
      status: 'ok',
      canonicalPath: '/lib/TV/The Cop/Season 02/The Cop - S02E03.mkv',
    });
  });

  it('should leave show titles as guessed when no alias exists', async () => {
    const reconstructor = createReconstructor({
      '/in/the.office.s01e01.avi': { title: 'the office', season: 1, episode: 1 },
    });

    const result = await reconstructor.reconstruct('/in/the.office.s01e01.avi');
    expect(result).toMatchObject({ canonicalPath: '/lib/TV/the office/Season 01/the office - S01E01.avi' });
  });

  it('should omit the year of a movie without one', async () => {
    const reconstructor = createReconstructor({
      '/in/untitled.mkv': { title: 'untitled project' },
    });

    const result = await reconstructor.reconstruct('/in/untitled.mkv');
    expect(result).toMatchObject({
      status: 'ok',
      canonicalPath: '/lib/Movies/Untitled Project/Untitled Project.mkv',
    });
  });

  it('should produce the same path on every call', async () => {
    const reconstructor = createReconstructor({
      '/in/movie.mkv': { title: 'movie', year: 2001 },
    });

    const first = await reconstructor.reconstruct('/in/movie.mkv');
    const second = await reconstructor.reconstruct('/in/movie.mkv');
    expect(second).toEqual(first);
  });

  it.each([
    ['/in/unparseable.mkv', null, 'filename could not be parsed'],
    ['/in/no-title.mkv', { year: 2019 }, 'no title could be guessed'],
    ['/in/blank-title.mkv', { title: '   ' }, 'no title could be guessed'],
    ['/in/no-season.mkv', { title: 'Show', episode: 4 }, 'episode 4 has no season number'],
  ])('should report %s as unusable', async (rawPath, guess, reason) => {
    const reconstructor = createReconstructor({ [rawPath]: guess });

    await expect(reconstructor.reconstruct(rawPath)).resolves.toEqual({ status: 'unusable', reason });
  });
});
