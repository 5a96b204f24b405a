// tunnel-dns — convenience re-exports from @tunnel-dns/core

// Config
export { resolveConfig, type TunnelDnsConfig, type ParserPreference } from '@tunnel-dns/core';

// Cloudflare
export { CloudflareClient, createResponseParser, JsonResponseParser, TextResponseParser } from '@tunnel-dns/core';
export type { CloudflareCredentials, CloudflareZone, DnsRecordInput, ResponseParser, ParsedResponse } from '@tunnel-dns/core';

// Delegation
export { DelegationConfigurator, fetchZones, selectZone, generateLabel, looksLikeIpv4 } from '@tunnel-dns/core';
export type { DelegationResult, DelegationHooks, RandomSource } from '@tunnel-dns/core';

// Errors
export {
  TunnelDnsError,
  MissingDependencyError,
  EmptyInputError,
  ProviderError,
  NoZonesError,
  InvalidSelectionError,
} from '@tunnel-dns/core';

// Wizard
export { runSetup, type SetupOptions } from './wizard.js';
export { createPrompter, type Prompter, type PromptStreams, type PromptInput } from './prompt.js';
