import { ConfigManager } from '../../src/config/ConfigManager.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('ConfigManager', () => {
  it('should fall back to the defaults when nothing is set', () => {
    const config = new ConfigManager({ env: {} }).getConfig();

    expect(config.library).toEqual({
      rootPath: '/mnt/vdb/plexdrive/gdrive_decrypted',
      moviesPath: 'Movies',
      tvPath: 'TV Shows',
    });
    expect(config.history.resultsLimit).toBe(300);
    expect(config.subtitles.extension).toBe('.srt');
    expect(config.subtitles.languages).toEqual({ he: ['opensubtitles'], en: null });
    expect(config.cache.expirationDays).toBe(30);
    expect(config.providers.opensubtitles.apiKey).toBeUndefined();
  });

  it('should read overrides from the environment', () => {
    const config = new ConfigManager({
      env: {
        MEDIA_ROOT_PATH: '/library',
        CLOUD_MOVIE_PATH: 'Films',
        ORIGINAL_NAMES_LOG: '/logs/names.log',
        RESULTS_LIMIT: '25',
        SUBTITLE_LANGUAGES: '{"en":null,"fr":["opensubtitles"]}',
        OPENSUBTITLES_API_KEY: 'test-secret',
        UPLOAD_MODE: 'library',
        LOG_LEVEL: 'debug',
        LOG_FILE_ENABLED: 'false',
      },
    }).getConfig();

    expect(config.library.rootPath).toBe('/library');
    expect(config.library.moviesPath).toBe('Films');
    expect(config.library.tvPath).toBe('TV Shows');
    expect(config.history.originalNamesLog).toBe('/logs/names.log');
    expect(config.history.resultsLimit).toBe(25);
    expect(Object.keys(config.subtitles.languages)).toEqual(['en', 'fr']);
    expect(config.subtitles.languages.fr).toEqual(['opensubtitles']);
    expect(config.providers.opensubtitles.apiKey).toBe('test-secret');
    expect(config.upload.mode).toBe('library');
    expect(config.logging.level).toBe('debug');
    expect(config.logging.file.enabled).toBe(false);
  });

  it('should treat a zero limit as the whole log', () => {
    const config = new ConfigManager({ env: { RESULTS_LIMIT: '0' } }).getConfig();
    expect(config.history.resultsLimit).toBeNull();
  });

  it('should share the rclone settings with the migration', () => {
    const config = new ConfigManager({
      env: { RCLONE_BINARY: '/opt/rclone', RCLONE_REMOTE: 'Backup' },
    }).getConfig();

    expect(config.migration.rcloneBinary).toBe('/opt/rclone');
    expect(config.migration.remote).toBe('Backup');
  });

  it('should not leak changes into the defaults', () => {
    new ConfigManager({ env: { MEDIA_ROOT_PATH: '/elsewhere' } });
    const config = new ConfigManager({ env: {} }).getConfig();
    expect(config.library.rootPath).toBe('/mnt/vdb/plexdrive/gdrive_decrypted');
  });

  it.each([
    ['RESULTS_LIMIT', '-1'],
    ['RESULTS_LIMIT', 'many'],
    ['UPLOAD_MODE', 'ftp'],
    ['LOG_LEVEL', 'verbose'],
    ['SUBTITLE_LANGUAGES', 'he,en'],
    ['SUBTITLE_LANGUAGES', '{"heb":null}'],
    ['SUBTITLE_LANGUAGES', '{"he":"opensubtitles"}'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => new ConfigManager({ env: { [key]: value } })).toThrow(ConfigurationError);
  });

  describe('validate', () => {
    it('should warn when the OpenSubtitles key is missing', () => {
      const warnings = new ConfigManager({ env: {} }).validate();
      expect(warnings).toEqual([
        'OpenSubtitles API key not provided - OpenSubtitles provider will be disabled',
      ]);
    });

    it('should return no warnings for a complete configuration', () => {
      const warnings = new ConfigManager({ env: { OPENSUBTITLES_API_KEY: 'test-secret' } }).validate();
      expect(warnings).toEqual([]);
    });

    it('should reject unknown language codes', () => {
      const manager = new ConfigManager({ env: { SUBTITLE_LANGUAGES: '{"xx":null}' } });
      expect(() => manager.validate()).toThrow('Unknown subtitle language code: xx');
    });

    it('should reject an empty language map', () => {
      const manager = new ConfigManager({ env: { SUBTITLE_LANGUAGES: '{}' } });
      expect(() => manager.validate()).toThrow('At least one subtitle language must be configured');
    });
  });
});
