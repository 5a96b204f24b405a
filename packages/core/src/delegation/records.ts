import type { DnsRecordInput } from '../cloudflare/types.js';

const IPV4_SHAPE = /^[0-9]{1,3}\.[0-9]{1,3}\.[0-9]{1,3}\.[0-9]{1,3}$/;

/** Shape check only: four dot-separated groups of 1-3 digits, no 0-255 range check */
export function looksLikeIpv4(raw: string): boolean {
  return IPV4_SHAPE.test(raw);
}

export function recordName(label: string, domain: string): string {
  return `${label}.${domain}`;
}

export function buildARecord(label: string, domain: string, serverIp: string): DnsRecordInput {
  return { type: 'A', name: recordName(label, domain), content: serverIp, proxied: false, ttl: 1 };
}

/** NS record delegating `label.domain` to the name server at `nameServer` */
export function buildNsRecord(label: string, domain: string, nameServer: string): DnsRecordInput {
  return { type: 'NS', name: recordName(label, domain), content: nameServer, proxied: false, ttl: 1 };
}
