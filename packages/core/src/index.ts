// @tunnel-dns/core — Public API

// Config
export { resolveConfig, type TunnelDnsConfig, type ParserPreference } from './config.js';

// Logging & errors
export { debug, debugWarn, debugEnabled } from './debug.js';
export {
  TunnelDnsError,
  MissingDependencyError,
  EmptyInputError,
  ProviderError,
  NoZonesError,
  InvalidSelectionError,
  type TunnelDnsErrorKind,
} from './errors.js';

// Capability detection
export { DependencyChecker, type DependencyStatus, type CapabilityReport, type RuntimeGlobals } from './setup/deps.js';

// Cloudflare
export { CloudflareClient, CF_API_BASE, type CloudflareClientOptions } from './cloudflare/client.js';
export { JsonResponseParser } from './cloudflare/json-parser.js';
export { TextResponseParser } from './cloudflare/text-parser.js';
export { createResponseParser } from './cloudflare/parsers.js';
export type {
  CloudflareCredentials,
  CloudflareZone,
  CreatedRecord,
  DnsRecordInput,
  DnsRecordType,
  ParsedResponse,
  ResponseParser,
} from './cloudflare/types.js';

// Delegation (A + NS records)
export { DelegationConfigurator, type DelegationResult, type DelegationHooks } from './delegation/configurator.js';
export { fetchZones, selectZone } from './delegation/zones.js';
export { generateLabel, defaultRandomSource, clockRandomSource, LETTERS, type RandomSource } from './delegation/labels.js';
export { buildARecord, buildNsRecord, looksLikeIpv4, recordName } from './delegation/records.js';
