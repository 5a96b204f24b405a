import type { CloudflareZone, CreatedRecord, ParsedResponse, ResponseParser } from './types.js';

type Envelope = Record<string, unknown>;

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function firstErrorMessage(envelope: Record<string, unknown>): string {
  const errors = envelope.errors;
  if (Array.isArray(errors)) {
    const first: unknown = errors[0];
    if (isObject(first) && typeof first.message === 'string') return first.message;
  }
  return 'Unknown error';
}

/** Structured parser backed by JSON.parse */
export class JsonResponseParser implements ResponseParser {
  readonly kind = 'json';

  zones(raw: string, status: number): ParsedResponse<CloudflareZone[]> {
    const envelope = this.read(raw, status);
    if (!envelope.success) return envelope;

    const result = envelope.data.result;
    if (!Array.isArray(result)) {
      return { success: false, errorMessage: 'Cloudflare API response has no zone list' };
    }

    const zones: CloudflareZone[] = [];
    for (const entry of result) {
      if (isObject(entry) && typeof entry.id === 'string' && typeof entry.name === 'string') {
        zones.push({ id: entry.id, name: entry.name });
      }
    }
    return { success: true, data: zones };
  }

  createdRecord(raw: string, status: number): ParsedResponse<CreatedRecord> {
    const envelope = this.read(raw, status);
    if (!envelope.success) return envelope;

    const result = envelope.data.result;
    const id = isObject(result) && typeof result.id === 'string' ? result.id : undefined;
    return { success: true, data: { id } };
  }

  private read(
    raw: string,
    status: number,
  ): { success: true; data: Envelope } | { success: false; errorMessage: string } {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { success: false, errorMessage: `Cloudflare API returned non-JSON (${status}): ${raw.slice(0, 200)}` };
    }
    if (!isObject(parsed)) {
      return { success: false, errorMessage: `Cloudflare API returned an unexpected body (${status}): ${raw.slice(0, 200)}` };
    }
    if (parsed.success !== true) {
      return { success: false, errorMessage: firstErrorMessage(parsed) };
    }
    return { success: true, data: parsed };
  }
}
