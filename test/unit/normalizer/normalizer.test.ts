import { describe, it, expect } from 'vitest';
import { normalize, normalizeBatch } from '../../../src/normalizer/normalizer.js';
import { stableId } from '../../../src/model/ids.js';
import type { NormalizationResult, ObservationRecord } from '../../../src/model/records.js';
import { T0, arp, route } from '../../helpers/fixtures.js';

function accepted(result: NormalizationResult): ObservationRecord {
  if (!result.ok) throw new Error(`expected acceptance, got ${result.error.reason}`);
  return result.record;
}

function rejection(result: NormalizationResult) {
  if (result.ok) throw new Error('expected rejection');
  return { reason: result.error.reason, field: result.error.field };
}

describe('normalize', () => {
  describe('arp', () => {
    it('should canonicalize addresses and derive a content id', () => {
      const record = accepted(normalize(arp(T0, '10.0.0.2', 'AA-BB-CC-00-00-02'), ' r1 '));
      expect(record).toEqual({
        id: stableId('obs', 'arp', 'r1', String(T0), 'eth0', '', '', '10.0.0.2', 'aabbcc000002'),
        kind: 'arp',
        sourceHostId: 'r1',
        observedAt: T0,
        localInterface: 'eth0',
        localIp: null,
        localLinkAddress: null,
        neighborIp: '10.0.0.2',
        neighborLinkAddress: 'aabbcc000002',
      });
      expect(Object.isFrozen(record)).toBe(true);
    });

    it('should give differently spelled copies of a row the same id', () => {
      const a = accepted(normalize(arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02'), 'r1'));
      const b = accepted(normalize(arp(T0, '10.0.0.2', 'aabb.cc00.0002'), 'r1'));
      expect(a.id).toBe(b.id);
    });

    it('should reject bad neighbor addresses', () => {
      expect(rejection(normalize(arp(T0, '10.0.0.256', 'aa:bb:cc:00:00:02'), 'r1')))
        .toEqual({ reason: 'invalid-address', field: 'neighborIp' });
      expect(rejection(normalize(arp(T0, '224.0.0.1', 'aa:bb:cc:00:00:02'), 'r1')))
        .toEqual({ reason: 'non-unicast', field: 'neighborIp' });
      expect(rejection(normalize(arp(T0, '10.0.0.2', 'ff:ff:ff:ff:ff:ff'), 'r1')))
        .toEqual({ reason: 'non-unicast', field: 'neighborLinkAddress' });
      expect(rejection(normalize(arp(T0, '10.0.0.2', 'nope'), 'r1')))
        .toEqual({ reason: 'invalid-link-address', field: 'neighborLinkAddress' });
    });

    it('should report missing fields', () => {
      const raw = { kind: 'arp', observedAt: T0, localInterface: 'eth0', neighborIp: '10.0.0.2' };
      expect(rejection(normalize(raw, 'r1'))).toEqual({ reason: 'missing-field', field: 'neighborLinkAddress' });

      const noTime = { kind: 'arp', localInterface: 'eth0', neighborIp: '10.0.0.2', neighborLinkAddress: 'aa:bb:cc:00:00:02' };
      expect(rejection(normalize(noTime, 'r1'))).toEqual({ reason: 'missing-field', field: 'observedAt' });
    });
  });

  describe('timestamps', () => {
    it('should accept epoch numbers, digit strings and ISO text', () => {
      expect(accepted(normalize(arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02'), 'r1')).observedAt).toBe(T0);
      const iso = { ...arp(0, '10.0.0.2', 'aa:bb:cc:00:00:02'), observedAt: '2024-01-01T00:00:00Z' };
      expect(accepted(normalize(iso, 'r1')).observedAt).toBe(T0);
      const digits = { ...arp(0, '10.0.0.2', 'aa:bb:cc:00:00:02'), observedAt: String(T0) };
      expect(accepted(normalize(digits, 'r1')).observedAt).toBe(T0);
    });

    it('should reject negative and unparseable times', () => {
      expect(rejection(normalize(arp(-5, '10.0.0.2', 'aa:bb:cc:00:00:02'), 'r1')))
        .toEqual({ reason: 'invalid-timestamp', field: 'observedAt' });
      const text = { ...arp(0, '10.0.0.2', 'aa:bb:cc:00:00:02'), observedAt: 'yesterday' };
      expect(rejection(normalize(text, 'r1'))).toEqual({ reason: 'invalid-timestamp', field: 'observedAt' });
    });
  });

  describe('route', () => {
    it('should canonicalize destination and gateway', () => {
      const record = accepted(normalize(route(T0, '10.1.0.0/16', '10.0.0.1'), 'r1'));
      expect(record).toMatchObject({ kind: 'route', destination: '10.1.0.0/16', gateway: '10.0.0.1', metric: 0 });
    });

    it('should read an unspecified gateway as on-link', () => {
      const record = accepted(normalize(route(T0, '10.1.0.0/16', '0.0.0.0'), 'r1'));
      expect(record).toMatchObject({ gateway: null });
    });

    it('should reject host bits, group gateways and bad metrics', () => {
      expect(rejection(normalize(route(T0, '10.1.0.1/16', null), 'r1')))
        .toEqual({ reason: 'cidr-host-bits', field: 'destination' });
      expect(rejection(normalize(route(T0, '10.1.0.0/16', '224.0.0.9'), 'r1')))
        .toEqual({ reason: 'non-unicast', field: 'gateway' });
      expect(rejection(normalize(route(T0, '10.1.0.0/16', null, { metric: -1 }), 'r1')))
        .toEqual({ reason: 'invalid-field', field: 'metric' });
    });

    it('should require a metric', () => {
      const raw = { kind: 'route', observedAt: T0, destination: '10.1.0.0/16', gateway: '10.0.0.1', outgoingInterface: 'eth0' };
      expect(rejection(normalize(raw, 'r1'))).toEqual({ reason: 'missing-field', field: 'metric' });
    });

    it('should keep the outgoing interface address in the record and its id', () => {
      const record = accepted(normalize(route(T0, '10.1.0.0/16', '10.0.0.1', { localIp: '10.0.0.7' }), 'r1'));
      expect(record).toMatchObject({ kind: 'route', localIp: '10.0.0.7' });
      expect(record.id).toBe(stableId('obs', 'route', 'r1', String(T0), '10.1.0.0/16', '10.0.0.1', 'eth0', '0', '10.0.0.7'));
      expect(accepted(normalize(route(T0, '10.1.0.0/16', '10.0.0.1'), 'r1')).id).not.toBe(record.id);

      expect(rejection(normalize(route(T0, '10.1.0.0/16', '10.0.0.1', { localIp: '255.255.255.255' }), 'r1')))
        .toEqual({ reason: 'non-unicast', field: 'localIp' });
    });
  });

  describe('alias', () => {
    it('should accept a link address alias', () => {
      const record = accepted(normalize({ kind: 'alias', observedAt: T0, linkAddress: 'AA:BB:CC:00:00:09', localInterface: 'eth1' }, 'r1'));
      expect(record).toMatchObject({ kind: 'alias', aliasHostId: null, linkAddress: 'aabbcc000009', localInterface: 'eth1' });
    });

    it('should require exactly one target', () => {
      expect(rejection(normalize({ kind: 'alias', observedAt: T0 }, 'r1')))
        .toEqual({ reason: 'invalid-field', field: 'aliasHostId' });
      expect(rejection(normalize({ kind: 'alias', observedAt: T0, aliasHostId: 'r2', linkAddress: 'aa:bb:cc:00:00:09' }, 'r1')))
        .toEqual({ reason: 'invalid-field', field: 'aliasHostId' });
    });

    it('should refuse self aliases and interface names on host aliases', () => {
      expect(rejection(normalize({ kind: 'alias', observedAt: T0, aliasHostId: 'r1' }, 'r1')))
        .toEqual({ reason: 'invalid-field', field: 'aliasHostId' });
      expect(rejection(normalize({ kind: 'alias', observedAt: T0, aliasHostId: 'r2', localInterface: 'eth0' }, 'r1')))
        .toEqual({ reason: 'invalid-field', field: 'localInterface' });
    });
  });

  it('should reject unknown kinds and non-objects', () => {
    const unknown = normalize({ kind: 'ping', observedAt: T0 }, 'r1', 4);
    expect(unknown).toEqual({
      ok: false,
      error: { index: 4, kind: 'ping', reason: 'unknown-kind', field: 'kind', message: 'Unknown observation kind: ping' },
    });
    expect(rejection(normalize(null, 'r1'))).toEqual({ reason: 'invalid-field', field: null });
  });

  it('should reject an empty source host id', () => {
    expect(rejection(normalize(arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02'), '  ')))
      .toEqual({ reason: 'missing-field', field: 'sourceHostId' });
  });
});

describe('normalizeBatch', () => {
  it('should split accepted records from indexed errors', () => {
    const { records, errors } = normalizeBatch([
      arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02'),
      { kind: 'bogus' },
      route(T0, '10.1.0.0/16', '10.0.0.1'),
      route(T0, '10.1.0.0/33', '10.0.0.1'),
    ], 'r1');

    expect(records.map(r => r.kind)).toEqual(['arp', 'route']);
    expect(errors.map(e => [e.index, e.reason])).toEqual([[1, 'unknown-kind'], [3, 'invalid-address']]);
  });
});
