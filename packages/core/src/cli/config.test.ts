import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { CliError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', logFormat: 'pretty', defaultTz: 'UTC' });
  });

  it('should read every variable', () => {
    expect(
      loadConfig({
        TZBUCKET_LOG_LEVEL: 'DEBUG',
        TZBUCKET_LOG_FORMAT: 'json',
        TZBUCKET_DEFAULT_TZ: ' Europe/Berlin ',
      }),
    ).toEqual({ logLevel: 'debug', logFormat: 'json', defaultTz: 'Europe/Berlin' });
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ TZ: 'Asia/Tokyo', HOME: '/root' }).defaultTz).toBe('UTC');
  });

  it('should name the invalid variables', () => {
    try {
      loadConfig({ TZBUCKET_LOG_LEVEL: 'loud', TZBUCKET_DEFAULT_TZ: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CliError);
      if (error instanceof CliError) {
        expect(error.exitCode).toBe(2);
        expect(error.message).toMatch(/^Invalid configuration: TZBUCKET_LOG_LEVEL: /);
        expect(error.message).toContain('; TZBUCKET_DEFAULT_TZ: ');
      }
    }
  });
});
