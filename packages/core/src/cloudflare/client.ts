import { debug, debugWarn } from '../debug.js';
import { ProviderError } from '../errors.js';
import { JsonResponseParser } from './json-parser.js';
import type { CloudflareCredentials, CloudflareZone, DnsRecordInput, ResponseParser } from './types.js';

export const CF_API_BASE = 'https://api.cloudflare.com/client/v4';

export interface CloudflareClientOptions {
  apiBase?: string;
  parser?: ResponseParser;
}

export class CloudflareClient {
  private credentials: CloudflareCredentials;
  private apiBase: string;
  private parser: ResponseParser;

  constructor(credentials: CloudflareCredentials, options: CloudflareClientOptions = {}) {
    this.credentials = credentials;
    this.apiBase = options.apiBase ?? CF_API_BASE;
    this.parser = options.parser ?? new JsonResponseParser();
  }

  // --- Zone methods ---

  /** Zones visible to the credentials, in the order Cloudflare returns them */
  async listZones(): Promise<CloudflareZone[]> {
    const { status, text } = await this.request('GET', '/zones');
    const parsed = this.parser.zones(text, status);
    if (!parsed.success) {
      throw this.failure('Error getting zones', parsed.errorMessage, text);
    }
    return parsed.data ?? [];
  }

  // --- DNS methods ---

  /** Create one record; resolves to the new record id when the response carries one */
  async createDnsRecord(zoneId: string, record: DnsRecordInput): Promise<string | undefined> {
    const { status, text } = await this.request('POST', `/zones/${zoneId}/dns_records`, {
      type: record.type,
      name: record.name,
      content: record.content,
      proxied: record.proxied,
      ttl: record.ttl,
    });
    const parsed = this.parser.createdRecord(text, status);
    if (!parsed.success) {
      throw this.failure(`Error creating ${record.type} record`, parsed.errorMessage, text);
    }
    return parsed.data?.id;
  }

  // --- Internal ---

  private failure(context: string, errorMessage: string | undefined, raw: string): ProviderError {
    // The text parser has no message to offer beyond the body itself
    if (this.parser.kind === 'text') {
      return new ProviderError(`${context}: unexpected response from Cloudflare`, raw);
    }
    return new ProviderError(`${context}: ${errorMessage ?? 'Unknown error'}`);
  }

  private async request(method: string, path: string, body?: unknown): Promise<{ status: number; text: string }> {
    const url = `${this.apiBase}${path}`;
    debug('cloudflare', `${method} ${path}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'X-Auth-Email': this.credentials.email,
          'X-Auth-Key': this.credentials.apiKey,
          'Content-Type': 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (err) {
      throw new ProviderError(`Could not reach Cloudflare: ${err instanceof Error ? err.message : String(err)}`);
    }

    const text = await response.text();
    if (response.ok) debug('cloudflare', `${method} ${path} -> ${response.status}`);
    else debugWarn('cloudflare', `${method} ${path} -> ${response.status}`);
    return { status: response.status, text };
  }
}
