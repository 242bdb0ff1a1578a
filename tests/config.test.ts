import { describe, it, expect } from 'vitest';
import { parseAuditConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseAuditConfig', () => {
  it('applies defaults', () => {
    expect(parseAuditConfig({ zone: 'example.com' }, {})).toEqual({
      provider: 'route53',
      zone: 'example.com',
      private: false,
      timeout: 5000,
      silent: false,
      csvScope: 'all',
      ignore: [],
      dedupe: true,
      strategy: 'chain',
      logLevel: 'warn',
      failOnUnresolved: false,
    });
  });

  it('coerces numeric strings from the command line', () => {
    const config = parseAuditConfig({ zone: 'example.com', limit: '25', timeout: '1500' }, {});

    expect(config.limit).toBe(25);
    expect(config.timeout).toBe(1500);
  });

  it('requires a zone', () => {
    expect(() => parseAuditConfig({}, {})).toThrow(ConfigError);
  });

  it('rejects a negative limit', () => {
    expect(() => parseAuditConfig({ zone: 'example.com', limit: '-1' }, {})).toThrow(
      /limit: Number must be greater than or equal to 0/
    );
  });

  it('rejects an invalid ignore pattern', () => {
    try {
      parseAuditConfig({ zone: 'example.com', ignore: ['ok', '(unclosed'] }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).issues).toEqual(['ignore.1: invalid ignore pattern: (unclosed']);
    }
  });

  it('takes the cloudflare token from the environment', () => {
    const config = parseAuditConfig(
      { zone: 'example.com', provider: 'cloudflare' },
      { CF_API_TOKEN: 'test-token' }
    );

    expect(config.provider).toBe('cloudflare');
    expect(config.cloudflareToken).toBe('test-token');
  });

  it('requires a token for cloudflare', () => {
    try {
      parseAuditConfig({ zone: 'example.com', provider: 'cloudflare' }, {});
      expect.unreachable();
    } catch (err) {
      expect((err as ConfigError).issues).toEqual([
        'cloudflareToken: CF_API_TOKEN must be set for the cloudflare provider',
      ]);
    }
  });

  it('rejects private zones on cloudflare', () => {
    try {
      parseAuditConfig(
        { zone: 'example.com', provider: 'cloudflare', private: true },
        { CF_API_TOKEN: 'test-token' }
      );
      expect.unreachable();
    } catch (err) {
      expect((err as ConfigError).issues).toEqual(['private: cloudflare has no private zones']);
    }
  });

  it('rejects an unknown csv scope', () => {
    expect(() => parseAuditConfig({ zone: 'example.com', csvScope: 'some' }, {})).toThrow(
      ConfigError
    );
  });
});
