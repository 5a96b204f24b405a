import type { CloudflareZone, CreatedRecord, ParsedResponse, ResponseParser } from './types.js';

const SUCCESS_MARKER = '"success":true';

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', b: '\b', f: '\f' };

/**
 * Reads a JSON string literal starting at `start` (the opening quote).
 * Returns the decoded value and the index just past the closing quote.
 */
function readString(raw: string, start: number): { value: string; end: number } {
  let value = '';
  let i = start + 1;
  while (i < raw.length && raw[i] !== '"') {
    if (raw[i] === '\\' && i + 1 < raw.length) {
      const next = raw[i + 1];
      const hex = next === 'u' ? raw.slice(i + 2, i + 6) : '';
      if (/^[0-9a-fA-F]{4}$/.test(hex)) {
        value += String.fromCharCode(Number.parseInt(hex, 16));
        i += 6;
        continue;
      }
      value += ESCAPES[next] ?? next;
      i += 2;
    } else {
      value += raw[i];
      i++;
    }
  }
  return { value, end: i + 1 };
}

/**
 * Walks the top-level `"result":[...]` array and collects the string
 * `id` and `name` fields that sit directly on each element. Fields of
 * nested objects (account, owner, plan, ...) are skipped by depth.
 */
function scanZones(raw: string): CloudflareZone[] {
  const marker = raw.search(/"result"\s*:\s*\[/);
  if (marker === -1) return [];

  const zones: CloudflareZone[] = [];
  let depth = 0;
  let current: Partial<CloudflareZone> = {};
  let pendingKey: string | null = null;
  let i = raw.indexOf('[', marker) + 1;

  while (i < raw.length) {
    const ch = raw[i];
    if (ch === '"') {
      const { value, end } = readString(raw, i);
      i = end;
      if (depth !== 1) continue;
      const after = raw.slice(i).match(/^\s*:/);
      if (after) {
        pendingKey = value;
        i += after[0].length;
        continue;
      }
      if (pendingKey === 'id' || pendingKey === 'name') current[pendingKey] = value;
      pendingKey = null;
      continue;
    }
    if (ch === '{' || ch === '[') {
      depth++;
      if (depth === 1) current = {};
    } else if (ch === '}' || ch === ']') {
      if (depth === 0) break; // end of result array
      if (depth === 1 && current.id !== undefined && current.name !== undefined) {
        zones.push({ id: current.id, name: current.name });
      }
      depth--;
      if (depth === 1) pendingKey = null;
    } else if (ch === ',' && depth === 1) {
      pendingKey = null;
    }
    i++;
  }
  return zones;
}

/** Fallback parser that never builds an object tree, only scans the body text */
export class TextResponseParser implements ResponseParser {
  readonly kind = 'text';

  zones(raw: string): ParsedResponse<CloudflareZone[]> {
    if (!raw.includes(SUCCESS_MARKER)) return { success: false, errorMessage: raw };
    return { success: true, data: scanZones(raw) };
  }

  createdRecord(raw: string): ParsedResponse<CreatedRecord> {
    if (!raw.includes(SUCCESS_MARKER)) return { success: false, errorMessage: raw };
    const match = raw.match(/"id"\s*:\s*"([^"]*)"/);
    return { success: true, data: { id: match?.[1] } };
  }
}
