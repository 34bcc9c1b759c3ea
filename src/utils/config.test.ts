import { describe, it, expect } from 'vitest';
import { getLogLevel, isPosixlyCorrect, loadConfig, shouldUsePretty } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      posixlyCorrect: false,
      logLevel: 'info',
      logPretty: true,
    });
  });

  it('should read every setting from the environment', () => {
    expect(loadConfig({ POSIXLY_CORRECT: '1', LOG_LEVEL: 'DEBUG', LOG_PRETTY: 'false' })).toEqual({
      posixlyCorrect: true,
      logLevel: 'debug',
      logPretty: false,
    });
  });
});

describe('isPosixlyCorrect', () => {
  it('should be enabled by presence alone', () => {
    expect(isPosixlyCorrect({ POSIXLY_CORRECT: '' })).toBe(true);
    expect(isPosixlyCorrect({ POSIXLY_CORRECT: undefined })).toBe(false);
  });
});

describe('getLogLevel', () => {
  it('should ignore unknown levels', () => {
    expect(getLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
    expect(getLogLevel({ LOG_LEVEL: 'warn' })).toBe('warn');
  });
});

describe('shouldUsePretty', () => {
  it('should default to JSON logs in production', () => {
    expect(shouldUsePretty({ NODE_ENV: 'production' })).toBe(false);
    expect(shouldUsePretty({ NODE_ENV: 'production', LOG_PRETTY: 'true' })).toBe(true);
  });
});
