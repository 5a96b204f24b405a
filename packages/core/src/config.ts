import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import JSON5 from 'json5';
import { CF_API_BASE } from './cloudflare/client.js';

export type ParserPreference = 'auto' | 'json' | 'text';

export interface TunnelDnsConfig {
  /** Cloudflare API v4 base URL, without trailing slash */
  apiBase: string;
  /** Which response parser to use; `text` forces the plain-text fallback */
  parser: ParserPreference;
  dataDir: string;
}

const PARSER_PREFERENCES: readonly ParserPreference[] = ['auto', 'json', 'text'];

const DEFAULT_CONFIG: TunnelDnsConfig = {
  apiBase: CF_API_BASE,
  parser: 'auto',
  dataDir: join(homedir(), '.tunnel-dns'),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toParserPreference(value: unknown): ParserPreference | undefined {
  return PARSER_PREFERENCES.find(p => p === value);
}

/** Copy recognised keys from a parsed config file, ignoring anything else */
function applyFileConfig(config: TunnelDnsConfig, source: Record<string, unknown>): void {
  if (typeof source.apiBase === 'string' && source.apiBase.trim()) {
    config.apiBase = source.apiBase.trim().replace(/\/+$/, '');
  }
  if (source.parser !== undefined) {
    config.parser = toParserPreference(source.parser) ?? DEFAULT_CONFIG.parser;
  }
}

export function resolveConfig(overrides?: Partial<TunnelDnsConfig>): TunnelDnsConfig {
  const env = process.env;
  const config: TunnelDnsConfig = {
    apiBase: env.TUNNEL_DNS_API_BASE?.replace(/\/+$/, '') || DEFAULT_CONFIG.apiBase,
    parser: toParserPreference(env.TUNNEL_DNS_PARSER) ?? DEFAULT_CONFIG.parser,
    dataDir: env.TUNNEL_DNS_DATA_DIR?.replace(/^~(?=\/|$)/, homedir()) ?? DEFAULT_CONFIG.dataDir,
  };

  // File config may carry comments and trailing commas
  const configPath = join(config.dataDir, 'config.json');
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON5.parse(readFileSync(configPath, 'utf-8'));
      if (!isRecord(fileConfig)) throw new Error('not an object');
      applyFileConfig(config, fileConfig);
    } catch {
      console.warn('[tunnel-dns] Ignoring malformed config file:', configPath);
    }
  }

  if (overrides) {
    Object.assign(config, overrides);
  }

  return config;
}
