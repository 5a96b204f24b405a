import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DelegationConfigurator } from '../delegation/configurator.js';
import { ProviderError } from '../errors.js';
import type { RandomSource } from '../delegation/labels.js';

/** Replays letter indices: 16 = q, 17 = r */
function draws(...indices: number[]): RandomSource {
  return () => {
    const next = indices.shift();
    if (next === undefined) throw new Error('no more draws');
    return next;
  };
}

const zone = { id: 'z1', name: 'example.com' };

describe('DelegationConfigurator', () => {
  let mockCf: { createDnsRecord: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockCf = {
      createDnsRecord: vi.fn().mockResolvedValueOnce('rec-a').mockResolvedValueOnce('rec-ns'),
    };
  });

  it('creates the A record first, then the NS record pointing at it', async () => {
    const dns = new DelegationConfigurator(mockCf, draws(16, 17));
    const result = await dns.createDelegation(zone, '203.0.113.5');

    expect(mockCf.createDnsRecord).toHaveBeenCalledTimes(2);
    expect(mockCf.createDnsRecord.mock.calls[0]).toEqual([
      'z1',
      { type: 'A', name: 'q.example.com', content: '203.0.113.5', proxied: false, ttl: 1 },
    ]);
    expect(mockCf.createDnsRecord.mock.calls[1]).toEqual([
      'z1',
      { type: 'NS', name: 'r.example.com', content: 'q.example.com', proxied: false, ttl: 1 },
    ]);
    expect(result.aRecordId).toBe('rec-a');
    expect(result.nsRecordId).toBe('rec-ns');
    expect(result.tunnelDomain).toBe('r.example.com');
  });

  it('redraws the NS label when it collides with the A label', async () => {
    const dns = new DelegationConfigurator(mockCf, draws(4, 4, 4, 9));
    const result = await dns.createDelegation(zone, '198.51.100.7');

    expect(result.aRecord.name).toBe('e.example.com');
    expect(result.nsRecord.name).toBe('j.example.com');
    expect(result.nsRecord.content).toBe('e.example.com');
  });

  it('never attempts the NS record when the A record fails', async () => {
    mockCf.createDnsRecord = vi.fn().mockRejectedValue(new ProviderError('Error creating A record: Record already exists.'));
    const dns = new DelegationConfigurator(mockCf, draws(16, 17));

    await expect(dns.createDelegation(zone, '203.0.113.5')).rejects.toThrow('Error creating A record: Record already exists.');
    expect(mockCf.createDnsRecord).toHaveBeenCalledTimes(1);
  });

  it('reports progress through hooks', async () => {
    const events: string[] = [];
    const dns = new DelegationConfigurator(mockCf, draws(16, 17));

    await dns.createDelegation(zone, '203.0.113.5', {
      onPlanned: (r) => events.push(`planned ${r.type} ${r.name}`),
      onCreated: (r, id) => events.push(`created ${r.type} ${id}`),
    });

    expect(events).toEqual([
      'planned A q.example.com',
      'created A rec-a',
      'planned NS r.example.com',
      'created NS rec-ns',
    ]);
  });
});
