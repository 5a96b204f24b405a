import type { CloudflareClient } from '../cloudflare/client.js';
import type { CloudflareZone } from '../cloudflare/types.js';
import { InvalidSelectionError, NoZonesError } from '../errors.js';

/** List zones and fail with NoZonesError when the account has none */
export async function fetchZones(cf: Pick<CloudflareClient, 'listZones'>): Promise<CloudflareZone[]> {
  const zones = await cf.listZones();
  if (zones.length === 0) throw new NoZonesError();
  return zones;
}

/** Map a 1-based selection, as typed by the user, onto the zone list */
export function selectZone(zones: readonly CloudflareZone[], input: string): CloudflareZone {
  const trimmed = input.trim();
  if (!/^[0-9]+$/.test(trimmed)) throw new InvalidSelectionError();

  const index = Number.parseInt(trimmed, 10);
  const zone = index >= 1 ? zones[index - 1] : undefined;
  if (!zone) throw new InvalidSelectionError();
  return zone;
}
