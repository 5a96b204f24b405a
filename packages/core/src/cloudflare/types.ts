/** Global API key credentials (X-Auth-Email / X-Auth-Key) */
export interface CloudflareCredentials {
  email: string;
  apiKey: string;
}

export interface CloudflareZone {
  id: string;
  name: string;
}

export type DnsRecordType = 'A' | 'NS';

/** A record as submitted to POST /zones/:id/dns_records */
export interface DnsRecordInput {
  type: DnsRecordType;
  name: string;
  content: string;
  proxied: false;
  /** 1 = automatic */
  ttl: 1;
}

/** Normalized outcome of reading a Cloudflare response body */
export interface ParsedResponse<T> {
  success: boolean;
  data?: T;
  errorMessage?: string;
}

export interface CreatedRecord {
  id?: string;
}

/**
 * Reads raw Cloudflare response bodies. Picked once at startup so
 * callers never branch on which implementation is active.
 */
export interface ResponseParser {
  readonly kind: 'json' | 'text';
  zones(raw: string, status: number): ParsedResponse<CloudflareZone[]>;
  createdRecord(raw: string, status: number): ParsedResponse<CreatedRecord>;
}
