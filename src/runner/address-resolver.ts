import { getAttribute, getStringAttribute } from './attributes.js';
import type { ConnectorOptions } from './config.js';
import type {
  AttributeTree,
  CloudProvider,
  HostSpec,
  NodeRecord,
  NodeTarget,
} from './executor-interface.js';

export const UNKNOWN_ADDRESS = 'unknown';

const CLOUD_PROVIDERS: readonly CloudProvider[] = ['ec2', 'rackspace', 'eucalyptus'];

export function isCloud(attrs: AttributeTree): boolean {
  return getAttribute(attrs, 'cloud') !== undefined;
}

export function cloudProvider(attrs: AttributeTree): CloudProvider | undefined {
  const provider = getStringAttribute(attrs, 'cloud.provider');
  return CLOUD_PROVIDERS.find(p => p === provider);
}

export function isEc2(attrs: AttributeTree): boolean {
  return cloudProvider(attrs) === 'ec2';
}

export function isRackspace(attrs: AttributeTree): boolean {
  return cloudProvider(attrs) === 'rackspace';
}

export function isEucalyptus(attrs: AttributeTree): boolean {
  return cloudProvider(attrs) === 'eucalyptus';
}

export function publicHostname(attrs: AttributeTree): string | undefined {
  return isCloud(attrs)
    ? getStringAttribute(attrs, 'cloud.public_hostname')
    : getStringAttribute(attrs, 'fqdn');
}

export function publicIpv4(attrs: AttributeTree): string | undefined {
  return isCloud(attrs)
    ? getStringAttribute(attrs, 'cloud.public_ipv4')
    : getStringAttribute(attrs, 'ipaddress');
}

export function ec2InstanceId(attrs: AttributeTree): string | undefined {
  return getStringAttribute(attrs, 'ec2.instance_id');
}

/**
 * Pick the address used to reach a node. A cloud node is reached on its
 * public hostname, or its public IPv4 when it has no hostname; anything else
 * falls back to fqdn and then ipaddress. Returns UNKNOWN_ADDRESS when none of
 * these are present.
 */
export function resolveAddress(attrs: AttributeTree): string {
  // Any provider string counts here, not only the ones classified above.
  if (getStringAttribute(attrs, 'cloud.provider') !== undefined) {
    const cloudAddress =
      getStringAttribute(attrs, 'cloud.public_hostname') ??
      getStringAttribute(attrs, 'cloud.public_ipv4');
    if (cloudAddress) {
      return cloudAddress;
    }
  }

  return getStringAttribute(attrs, 'fqdn') ?? getStringAttribute(attrs, 'ipaddress') ?? UNKNOWN_ADDRESS;
}

export function buildTarget(spec: HostSpec, options: ConnectorOptions): NodeTarget {
  const node: NodeRecord = typeof spec === 'string' ? { name: spec, automatic: {} } : spec;
  const host = typeof spec === 'string' ? spec || UNKNOWN_ADDRESS : resolveAddress(node.automatic);
  const instanceId = ec2InstanceId(node.automatic);

  return Object.freeze({
    id: host === UNKNOWN_ADDRESS ? `${UNKNOWN_ADDRESS}:${node.name}` : host,
    host,
    nodeName: node.name,
    credentials: Object.freeze({
      user: options.user,
      password: options.password,
      keys: Object.freeze([...options.keys]),
    }),
    timeoutMs: Math.round(options.timeout * 1000),
    sudo: options.sudo,
    ...(instanceId ? { instanceId } : {}),
  });
}
