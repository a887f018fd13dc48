import { describe, it, expect } from 'vitest';
import { collapsePortList, effectiveProtocols, fixHighPorts } from '../src/core/ports.js';
import { AclErrorCode } from '../src/core/errors.js';
import { definePlatform } from '../src/platforms/define.js';
import type { Term } from '../src/types/index.js';
import { catchAclError } from './helpers.js';

const juniper = definePlatform({ platform: 'juniper' });
const iptables = definePlatform({
  platform: 'iptables',
  defaultProtocol: 'all',
  filterBlacklist: { inet: ['icmpv6'], inet6: ['icmp'] },
});
const gce = definePlatform({ platform: 'gce', supportedAddressFamilies: ['inet'], allProtocolsStateful: true });

function term(overrides: Partial<Term> = {}): Term {
  return { name: 'allow-returns', ...overrides };
}

// ─── Collapsing ──────────────────────────────────────────────────────

describe('collapsePortList', () => {
  it('keeps disjoint ranges separate', () => {
    expect(collapsePortList([[80, 80], [1024, 65535]])).toEqual([[80, 80], [1024, 65535]]);
  });

  it('merges overlapping ranges', () => {
    expect(collapsePortList([[1023, 1030], [1024, 65535]])).toEqual([[1023, 65535]]);
  });

  it('merges adjacent ranges and sorts by low bound', () => {
    expect(collapsePortList([[20, 30], [12, 12], [1, 5], [11, 11], [3, 10]])).toEqual([[1, 12], [20, 30]]);
  });

  it('keeps the wider upper bound when a range is contained', () => {
    expect(collapsePortList([[1, 100], [5, 10]])).toEqual([[1, 100]]);
  });

  it('is idempotent', () => {
    const once = collapsePortList([[443, 443], [80, 90], [85, 100], [8080, 8080]]);
    expect(once).toEqual([[80, 100], [443, 443], [8080, 8080]]);
    expect(collapsePortList(once)).toEqual(once);
  });

  it('does not modify its input', () => {
    const input: [number, number][] = [[10, 20], [15, 30]];
    collapsePortList(input);
    expect(input).toEqual([[10, 20], [15, 30]]);
  });

  it('returns an empty list for no ports', () => {
    expect(collapsePortList([])).toEqual([]);
  });
});

// ─── Protocols ───────────────────────────────────────────────────────

describe('effectiveProtocols', () => {
  it('uses declared protocols', () => {
    expect([...effectiveProtocols(term({ protocol: ['tcp', 'udp'] }), juniper)]).toEqual(['tcp', 'udp']);
  });

  it('falls back to the platform default', () => {
    expect([...effectiveProtocols(term(), juniper)]).toEqual(['ip']);
    expect([...effectiveProtocols(term({ protocol: [] }), iptables)]).toEqual(['all']);
  });
});

// ─── High ports ──────────────────────────────────────────────────────

describe('fixHighPorts', () => {
  it('adds high ports to an established tcp term', () => {
    const original = term({ protocol: ['tcp'], option: ['established'], destination_port: [[80, 80]] });
    const fixed = fixHighPorts(original, juniper);
    expect(fixed).not.toBe(original);
    expect(fixed.destination_port).toEqual([[80, 80], [1024, 65535]]);
  });

  it('collapses the added range into overlapping ports', () => {
    const original = term({ protocol: ['tcp'], option: ['established'], destination_port: [[1023, 1030]] });
    expect(fixHighPorts(original, juniper).destination_port).toEqual([[1023, 65535]]);
  });

  it('adds high ports when the term has no destination ports', () => {
    const original = term({ protocol: ['udp'], option: ['established'] });
    expect(fixHighPorts(original, juniper).destination_port).toEqual([[1024, 65535]]);
  });

  it('never mutates the original term', () => {
    const original = term({
      protocol: ['tcp', 'udp'],
      option: ['established'],
      destination_port: [[80, 80]],
      comment: ['return traffic'],
    });
    const fixed = fixHighPorts(original, juniper);
    expect(original.destination_port).toEqual([[80, 80]]);
    expect(fixed.comment).toEqual(['return traffic']);
    expect(fixed.comment).not.toBe(original.comment);
  });

  it('matches options that start with established', () => {
    const original = term({ protocol: ['tcp'], option: ['established-only'] });
    expect(fixHighPorts(original, juniper).destination_port).toEqual([[1024, 65535]]);
  });

  it('ignores options that only contain established', () => {
    const original = term({ protocol: ['tcp'], option: ['tcp-established'] });
    expect(fixHighPorts(original, juniper)).toBe(original);
  });

  it('returns the same term when there is no established option', () => {
    const original = term({ protocol: ['tcp'], option: ['counter'], destination_port: [[22, 22]] });
    expect(fixHighPorts(original, juniper)).toBe(original);
  });

  it('rejects established on non tcp/udp protocols', () => {
    const err = catchAclError(() => fixHighPorts(term({ protocol: ['icmp'], option: ['established'] }), juniper));
    expect(err.code).toBe(AclErrorCode.ESTABLISHED_OPTION);
    expect(err.details).toEqual({ term: 'allow-returns', protocols: ['icmp'], platform: 'juniper' });
  });

  it('names only the non tcp/udp protocols', () => {
    const err = catchAclError(() =>
      fixHighPorts(term({ protocol: ['tcp', 'gre', 'esp'], option: ['established'] }), juniper));
    expect(err.details).toEqual({ term: 'allow-returns', protocols: ['gre', 'esp'], platform: 'juniper' });
  });

  it('applies the default protocol to established checks', () => {
    const err = catchAclError(() => fixHighPorts(term({ option: ['established'] }), juniper));
    expect(err.details).toEqual({ term: 'allow-returns', protocols: ['ip'], platform: 'juniper' });
  });

  it('leaves the term alone when all protocols are stateful', () => {
    const original = term({ protocol: ['icmp'], option: ['established'] });
    expect(fixHighPorts(original, juniper, 'inet', true)).toBe(original);
  });

  it('takes the stateful default from the platform', () => {
    const original = term({ protocol: ['gre'], option: ['established'] });
    expect(fixHighPorts(original, gce)).toBe(original);
  });

  it('still adds high ports for tcp on stateful platforms', () => {
    const original = term({ protocol: ['tcp'], option: ['established'] });
    expect(fixHighPorts(original, gce).destination_port).toEqual([[1024, 65535]]);
  });

  it('rejects address families the platform does not support', () => {
    const err = catchAclError(() => fixHighPorts(term({ protocol: ['tcp'] }), gce, 'inet6'));
    expect(err.code).toBe(AclErrorCode.UNSUPPORTED_ADDRESS_FAMILY);
    expect(err.details).toEqual({ term: 'allow-returns', addressFamily: 'inet6', platform: 'gce' });
  });

  it('rejects blacklisted protocols for the address family', () => {
    const err = catchAclError(() => fixHighPorts(term({ protocol: ['icmp', 'tcp'] }), iptables, 'inet6'));
    expect(err.code).toBe(AclErrorCode.UNSUPPORTED_FILTER);
    expect(err.details).toEqual({ term: 'allow-returns', platform: 'iptables', values: ['icmp'] });
  });

  it('allows protocols blacklisted only for the other family', () => {
    const original = term({ protocol: ['icmp'] });
    expect(fixHighPorts(original, iptables, 'inet')).toBe(original);
  });

  it('checks the blacklist before the established option', () => {
    const err = catchAclError(() =>
      fixHighPorts(term({ protocol: ['icmpv6'], option: ['established'] }), iptables, 'inet'));
    expect(err.code).toBe(AclErrorCode.UNSUPPORTED_FILTER);
  });
});
