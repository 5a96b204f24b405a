import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  const originalEnv = process.env;
  let dataDir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    // Isolate every test from any real ~/.tunnel-dns/config.json
    dataDir = mkdtempSync(join(tmpdir(), 'tunnel-dns-test-'));
    process.env.TUNNEL_DNS_DATA_DIR = dataDir;
    delete process.env.TUNNEL_DNS_API_BASE;
    delete process.env.TUNNEL_DNS_PARSER;
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('returns defaults when no env vars or overrides', () => {
    const config = resolveConfig();
    expect(config.apiBase).toBe('https://api.cloudflare.com/client/v4');
    expect(config.parser).toBe('auto');
    expect(config.dataDir).toBe(dataDir);
  });

  it('reads from env vars', () => {
    process.env.TUNNEL_DNS_API_BASE = 'http://localhost:8787/v4/';
    process.env.TUNNEL_DNS_PARSER = 'text';

    const config = resolveConfig();
    expect(config.apiBase).toBe('http://localhost:8787/v4');
    expect(config.parser).toBe('text');
  });

  it('falls back to auto for an unknown parser value', () => {
    process.env.TUNNEL_DNS_PARSER = 'yaml';
    expect(resolveConfig().parser).toBe('auto');
  });

  it('merges config.json with comments and trailing commas', () => {
    writeFileSync(join(dataDir, 'config.json'), `{
      // local mock of the API
      apiBase: 'http://127.0.0.1:9000/client/v4/',
      parser: 'json',
    }`);

    const config = resolveConfig();
    expect(config.apiBase).toBe('http://127.0.0.1:9000/client/v4');
    expect(config.parser).toBe('json');
  });

  it('ignores a malformed config file', () => {
    writeFileSync(join(dataDir, 'config.json'), '{ parser: ');
    const config = resolveConfig();
    expect(config.parser).toBe('auto');
  });

  it('applies explicit overrides last', () => {
    process.env.TUNNEL_DNS_PARSER = 'text';
    const config = resolveConfig({ parser: 'json' });
    expect(config.parser).toBe('json');
  });
});
