import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino } from 'pino';
import { createDnsOracle } from '../src/resolver.js';

const mocks = vi.hoisted(() => ({
  resolve4: vi.fn(),
  setServers: vi.fn(),
  resolverOptions: [] as unknown[],
}));

vi.mock('node:dns', () => {
  class Resolver {
    resolve4 = mocks.resolve4;
    setServers = mocks.setServers;
    constructor(options?: unknown) {
      mocks.resolverOptions.push(options);
    }
  }
  return {
    default: { promises: { Resolver } },
    promises: { Resolver },
  };
});

function dnsError(code: string) {
  return Object.assign(new Error(`queryA ${code} example.com`), { code });
}

beforeEach(() => {
  vi.clearAllMocks();
  mocks.resolverOptions.length = 0;
});

describe('createDnsOracle', () => {
  it('returns sorted, de-duplicated addresses', async () => {
    mocks.resolve4.mockResolvedValue(['192.0.2.9', '192.0.2.1', '192.0.2.9']);

    const oracle = createDnsOracle();

    expect(await oracle.resolveA('example.com')).toEqual(['192.0.2.1', '192.0.2.9']);
  });

  it('returns null when the name does not exist', async () => {
    mocks.resolve4.mockRejectedValue(dnsError('ENOTFOUND'));

    expect(await createDnsOracle().resolveA('gone.example.com')).toBeNull();
  });

  it('returns null on timeout', async () => {
    mocks.resolve4.mockRejectedValue(dnsError('ETIMEOUT'));

    expect(await createDnsOracle().resolveA('slow.example.com')).toBeNull();
  });

  it('returns null for an empty answer', async () => {
    mocks.resolve4.mockResolvedValue([]);

    expect(await createDnsOracle().resolveA('empty.example.com')).toBeNull();
  });

  it('queries the normalized name', async () => {
    mocks.resolve4.mockResolvedValue(['192.0.2.1']);

    await createDnsOracle().resolveA('WWW.Example.com.');

    expect(mocks.resolve4).toHaveBeenCalledWith('www.example.com');
  });

  it('uses the default timeout and tries', () => {
    createDnsOracle();

    expect(mocks.resolverOptions).toEqual([{ timeout: 5000, tries: 2 }]);
    expect(mocks.setServers).not.toHaveBeenCalled();
  });

  it('applies a resolver override and timeout', () => {
    createDnsOracle({ server: '8.8.8.8', timeoutMs: 1500, tries: 1 });

    expect(mocks.resolverOptions).toEqual([{ timeout: 1500, tries: 1 }]);
    expect(mocks.setServers).toHaveBeenCalledWith(['8.8.8.8']);
  });

  it('memoizes lookups per name', async () => {
    mocks.resolve4.mockResolvedValue(['192.0.2.1']);
    const oracle = createDnsOracle();

    const first = await oracle.resolveA('a.example.com');
    const second = await oracle.resolveA('A.example.com.');

    expect(first).toEqual(['192.0.2.1']);
    expect(second).toEqual(['192.0.2.1']);
    expect(mocks.resolve4).toHaveBeenCalledTimes(1);
  });

  it('shares one query between concurrent lookups', async () => {
    mocks.resolve4.mockResolvedValue(['192.0.2.1']);
    const oracle = createDnsOracle();

    await Promise.all([oracle.resolveA('a.example.com'), oracle.resolveA('a.example.com')]);

    expect(mocks.resolve4).toHaveBeenCalledTimes(1);
  });

  it('memoizes failures too', async () => {
    mocks.resolve4.mockRejectedValue(dnsError('ENOTFOUND'));
    const oracle = createDnsOracle();

    await oracle.resolveA('gone.example.com');
    await oracle.resolveA('gone.example.com');

    expect(mocks.resolve4).toHaveBeenCalledTimes(1);
  });

  it('queries every time with the cache disabled', async () => {
    mocks.resolve4.mockResolvedValue(['192.0.2.1']);
    const oracle = createDnsOracle({ cache: false });

    await oracle.resolveA('a.example.com');
    await oracle.resolveA('a.example.com');

    expect(mocks.resolve4).toHaveBeenCalledTimes(2);
  });

  it('logs the error code at debug level', async () => {
    mocks.resolve4.mockRejectedValue(dnsError('ESERVFAIL'));
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });

    await createDnsOracle({ logger }).resolveA('broken.example.com');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]!)).toMatchObject({
      level: 20,
      name: 'broken.example.com',
      code: 'ESERVFAIL',
      msg: 'A lookup failed',
    });
  });
});
