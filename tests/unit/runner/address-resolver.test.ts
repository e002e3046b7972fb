import { describe, expect, it } from 'vitest';
import {
  buildTarget,
  cloudProvider,
  ec2InstanceId,
  isCloud,
  isEc2,
  isEucalyptus,
  isRackspace,
  publicHostname,
  publicIpv4,
  resolveAddress,
  UNKNOWN_ADDRESS,
} from '../../../src/runner/address-resolver.js';
import { parseConnectorOptions } from '../../../src/runner/config.js';

describe('resolveAddress', () => {
  it('prefers the public hostname of a cloud node', () => {
    expect(resolveAddress({ cloud: { provider: 'ec2', public_hostname: 'x.com' } })).toBe('x.com');
  });

  it('falls back to the public ipv4 when a cloud node has no hostname', () => {
    expect(resolveAddress({ cloud: { provider: 'ec2', public_ipv4: '1.2.3.4' } })).toBe('1.2.3.4');
  });

  it('uses the fqdn of a node without cloud attributes', () => {
    expect(resolveAddress({ fqdn: 'internal.example' })).toBe('internal.example');
  });

  it('uses the ipaddress when there is no fqdn', () => {
    expect(resolveAddress({ ipaddress: '192.168.1.1' })).toBe('192.168.1.1');
  });

  it('ignores cloud addresses when no provider is reported', () => {
    expect(resolveAddress({ cloud: { public_hostname: 'x.com' }, fqdn: 'internal.example' }))
      .toBe('internal.example');
  });

  it('falls back to fqdn when a cloud node has neither public address', () => {
    expect(resolveAddress({ cloud: { provider: 'rackspace' }, fqdn: 'box.internal' })).toBe('box.internal');
  });

  it('returns the unknown sentinel when nothing usable is present', () => {
    expect(resolveAddress({ fqdn: '', cloud: { provider: 'ec2' } })).toBe(UNKNOWN_ADDRESS);
  });
});

describe('provider classification', () => {
  it('classifies each known provider', () => {
    expect(isEc2({ cloud: { provider: 'ec2' } })).toBe(true);
    expect(isRackspace({ cloud: { provider: 'rackspace' } })).toBe(true);
    expect(isEucalyptus({ cloud: { provider: 'eucalyptus' } })).toBe(true);
    expect(isEc2({ cloud: { provider: 'rackspace' } })).toBe(false);
  });

  it('treats a node without a cloud key as non-cloud everywhere', () => {
    const attrs = { fqdn: 'internal.example' };
    expect(isCloud(attrs)).toBe(false);
    expect(cloudProvider(attrs)).toBeUndefined();
    expect(isEc2(attrs)).toBe(false);
    expect(isRackspace(attrs)).toBe(false);
    expect(isEucalyptus(attrs)).toBe(false);
  });

  it('counts an empty cloud subtree as cloud with no provider', () => {
    expect(isCloud({ cloud: {} })).toBe(true);
    expect(cloudProvider({ cloud: {} })).toBeUndefined();
  });
});

describe('public address accessors', () => {
  it('reads cloud values for cloud nodes', () => {
    const attrs = { cloud: { provider: 'ec2', public_ipv4: '10.0.0.1', public_hostname: 'web.example' } };
    expect(publicIpv4(attrs)).toBe('10.0.0.1');
    expect(publicHostname(attrs)).toBe('web.example');
  });

  it('reads fqdn and ipaddress for other nodes', () => {
    const attrs = { fqdn: 'web.internal', ipaddress: '192.168.1.1' };
    expect(publicIpv4(attrs)).toBe('192.168.1.1');
    expect(publicHostname(attrs)).toBe('web.internal');
  });

  it('reads the ec2 instance id', () => {
    expect(ec2InstanceId({ ec2: { instance_id: 'i-0abc' } })).toBe('i-0abc');
  });
});

describe('buildTarget', () => {
  const options = parseConnectorOptions({ user: 'deploy', password: 'test-secret' });

  it('builds a frozen target from a node record', () => {
    const target = buildTarget(
      { name: 'web-1', automatic: { cloud: { provider: 'ec2', public_hostname: 'web-1.example' }, ec2: { instance_id: 'i-1' } } },
      options,
    );

    expect(target).toEqual({
      id: 'web-1.example',
      host: 'web-1.example',
      nodeName: 'web-1',
      credentials: { user: 'deploy', password: 'test-secret', keys: [] },
      timeoutMs: 5000,
      sudo: true,
      instanceId: 'i-1',
    });
    expect(Object.isFrozen(target)).toBe(true);
  });

  it('accepts a bare address', () => {
    const target = buildTarget('33.33.33.10', options);
    expect(target.id).toBe('33.33.33.10');
    expect(target.nodeName).toBe('33.33.33.10');
  });

  it('keeps unresolvable nodes distinct', () => {
    const a = buildTarget({ name: 'a', automatic: {} }, options);
    const b = buildTarget({ name: 'b', automatic: {} }, options);
    expect(a.host).toBe(UNKNOWN_ADDRESS);
    expect(a.id).toBe('unknown:a');
    expect(b.id).toBe('unknown:b');
  });
});
