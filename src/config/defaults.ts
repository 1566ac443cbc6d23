import os from 'os';
import path from 'path';
import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  library: {
    rootPath: '/mnt/vdb/plexdrive/gdrive_decrypted',
    moviesPath: 'Movies',
    tvPath: 'TV Shows',
  },
  history: {
    originalNamesLog: '/var/log/original_names.log',
    resultsLimit: 300,
  },
  subtitles: {
    extension: '.srt',
    languages: {
      he: ['opensubtitles'],
      en: null,
    },
    tempPath: os.tmpdir(),
  },
  guessit: {
    binary: 'guessit',
    timeoutMs: 30000,
  },
  providers: {
    opensubtitles: {
      baseUrl: 'https://api.opensubtitles.com/api/v1',
      userAgent: 'subtitle-monitor v1.0.0',
      timeoutMs: 15000,
    },
  },
  cache: {
    directory: path.join(os.homedir(), '.cache', 'subtitle-monitor'),
    expirationDays: 30,
  },
  upload: {
    mode: 'rclone',
    rcloneBinary: '/usr/bin/rclone',
    remote: 'GDrive',
    remotePath: '',
  },
  migration: {
    odrivePython: '/usr/bin/python',
    odriveScript: '/opt/odrive/odrive.py',
    rcloneBinary: '/usr/bin/rclone',
    remote: 'GDrive',
    acdPrefix: '/amazon/Amazon Cloud Drive/',
    logName: 'gdrive-migration',
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: '/var/log/subtitle-monitor',
      maxSize: '5m',
      maxFiles: 2, // current file plus one backup
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
