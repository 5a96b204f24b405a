import type { CloudflareClient } from '../cloudflare/client.js';
import type { CloudflareZone, DnsRecordInput } from '../cloudflare/types.js';
import { debug } from '../debug.js';
import { buildARecord, buildNsRecord } from './records.js';
import { defaultRandomSource, generateLabel, type RandomSource } from './labels.js';

export interface DelegationResult {
  zone: CloudflareZone;
  aRecord: DnsRecordInput;
  nsRecord: DnsRecordInput;
  aRecordId?: string;
  nsRecordId?: string;
  /** The delegated name to hand to the DNS tunnel server */
  tunnelDomain: string;
}

export interface DelegationHooks {
  /** Called before a record is submitted */
  onPlanned?(record: DnsRecordInput): void;
  /** Called after Cloudflare accepted a record */
  onCreated?(record: DnsRecordInput, id: string | undefined): void;
}

/**
 * DelegationConfigurator creates the A + NS pair for DNS tunneling:
 * `x.domain A <server>` and `y.domain NS x.domain`, with x != y.
 * Records are created strictly in that order; a failed A record stops the run.
 * Nothing is rolled back if the NS record fails.
 */
export class DelegationConfigurator {
  constructor(
    private cf: Pick<CloudflareClient, 'createDnsRecord'>,
    private random: RandomSource = defaultRandomSource(),
  ) {}

  async createDelegation(zone: CloudflareZone, serverIp: string, hooks: DelegationHooks = {}): Promise<DelegationResult> {
    const aLabel = generateLabel(undefined, this.random);
    const aRecord = buildARecord(aLabel, zone.name, serverIp);
    hooks.onPlanned?.(aRecord);
    const aRecordId = await this.cf.createDnsRecord(zone.id, aRecord);
    debug('delegation', `A ${aRecord.name} created (${aRecordId ?? 'no id'})`);
    hooks.onCreated?.(aRecord, aRecordId);

    const nsLabel = generateLabel(aLabel, this.random);
    const nsRecord = buildNsRecord(nsLabel, zone.name, aRecord.name);
    hooks.onPlanned?.(nsRecord);
    const nsRecordId = await this.cf.createDnsRecord(zone.id, nsRecord);
    debug('delegation', `NS ${nsRecord.name} created (${nsRecordId ?? 'no id'})`);
    hooks.onCreated?.(nsRecord, nsRecordId);

    return { zone, aRecord, nsRecord, aRecordId, nsRecordId, tunnelDomain: nsRecord.name };
  }
}
