/**
 * Node kind catalog: default images and resource profiles per kind,
 * plus resource profiles for chassis components.
 */

export interface ResourceProfile {
  cpu: number;
  memoryGB: number;
}

export interface NodeKindEntry {
  kind: string;
  description: string;
  defaultImage?: string;
  resources: ResourceProfile;
  /** Per-`type` overrides of the kind profile */
  types?: Record<string, ResourceProfile>;
  /** Host-side constructs that run no container */
  imageless?: boolean;
}

export const DEFAULT_KIND = 'linux';
export const GENERIC_LINUX_IMAGE = 'ghcr.io/hellt/network-multitool';

/** Endpoint names that are valid without a node declaration */
export const SPECIAL_ENDPOINTS: readonly string[] = ['host', 'mgmt-net', 'macvlan'];

export const UNKNOWN_KIND_PROFILE: ResourceProfile = { cpu: 2, memoryGB: 4 };
export const UNKNOWN_COMPONENT_PROFILE: ResourceProfile = { cpu: 1, memoryGB: 2 };

const NODE_KINDS: readonly NodeKindEntry[] = [
  {
    kind: 'nokia_srlinux',
    description: 'Nokia SR Linux',
    defaultImage: 'ghcr.io/nokia/srlinux',
    resources: { cpu: 2, memoryGB: 4 },
    types: { ixrd3: { cpu: 4, memoryGB: 8 } },
  },
  {
    kind: 'nokia_sros',
    description: 'Nokia SR OS (vSIM)',
    defaultImage: 'ghcr.io/nokia/sros',
    resources: { cpu: 4, memoryGB: 8 },
  },
  { kind: 'linux', description: 'Generic Linux container', defaultImage: GENERIC_LINUX_IMAGE, resources: { cpu: 1, memoryGB: 2 } },
  { kind: 'cisco_iosxe', description: 'Cisco IOS XE', defaultImage: 'ghcr.io/cisco/iosxe', resources: { cpu: 2, memoryGB: 4 } },
  { kind: 'cisco_iosxr', description: 'Cisco IOS XR', defaultImage: 'ghcr.io/cisco/iosxr', resources: { cpu: 2, memoryGB: 4 } },
  { kind: 'juniper_vmx', description: 'Juniper vMX', defaultImage: 'ghcr.io/juniper/vmx', resources: { cpu: 2, memoryGB: 4 } },
  { kind: 'arista_ceos', description: 'Arista cEOS', defaultImage: 'ghcr.io/arista/ceos', resources: { cpu: 2, memoryGB: 4 } },
  { kind: 'sonic', description: 'SONiC', defaultImage: 'ghcr.io/opennetworking/sonic', resources: { cpu: 2, memoryGB: 4 } },
  { kind: 'frr', description: 'FRRouting', defaultImage: 'ghcr.io/hellt/frr', resources: { cpu: 1, memoryGB: 2 } },
  { kind: 'quagga', description: 'Quagga', defaultImage: 'ghcr.io/hellt/quagga', resources: { cpu: 1, memoryGB: 2 } },
  { kind: 'bridge', description: 'Linux bridge on the host', resources: { cpu: 0, memoryGB: 0 }, imageless: true },
  { kind: 'ovs-bridge', description: 'Open vSwitch bridge on the host', resources: { cpu: 0, memoryGB: 0 }, imageless: true },
  { kind: 'host', description: 'The container host itself', resources: { cpu: 0, memoryGB: 0 }, imageless: true },
];

// Matched by prefix of the lowercased component type, first match wins
const COMPONENT_PROFILES: ReadonlyArray<{ prefix: string; resources: ResourceProfile }> = [
  { prefix: 'cpm', resources: { cpu: 2, memoryGB: 4 } },
  { prefix: 'linecard', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'iom', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'imm', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'xcm', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'xiom', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'mda', resources: { cpu: 1, memoryGB: 2 } },
  { prefix: 'sfm', resources: { cpu: 1, memoryGB: 2 } },
];

const KIND_INDEX = new Map(NODE_KINDS.map(entry => [entry.kind, entry]));

export function listNodeKinds(): readonly NodeKindEntry[] {
  return NODE_KINDS;
}

export function isKnownKind(kind: string): boolean {
  return KIND_INDEX.has(kind);
}

export function isImagelessKind(kind: string): boolean {
  return KIND_INDEX.get(kind)?.imageless === true;
}

/**
 * Image to fill in for a node of this kind; unknown kinds get the generic Linux image
 */
export function defaultImageFor(kind: string): string {
  return KIND_INDEX.get(kind)?.defaultImage ?? GENERIC_LINUX_IMAGE;
}

/**
 * Resource profile of a node kind, honouring a per-type override
 */
export function kindProfile(kind: string, type?: string): ResourceProfile {
  const entry = KIND_INDEX.get(kind);
  if (!entry) {
    return UNKNOWN_KIND_PROFILE;
  }
  const key = type?.toLowerCase();
  return key && entry.types && Object.hasOwn(entry.types, key) ? entry.types[key] ?? entry.resources : entry.resources;
}

export function listComponentProfiles(): ReadonlyArray<{ prefix: string; resources: ResourceProfile }> {
  return COMPONENT_PROFILES;
}

export function componentProfile(type: string): ResourceProfile {
  const normalized = type.toLowerCase();
  return COMPONENT_PROFILES.find(p => normalized.startsWith(p.prefix))?.resources ?? UNKNOWN_COMPONENT_PROFILE;
}

export function isComponentType(name: string): boolean {
  const normalized = name.toLowerCase();
  return COMPONENT_PROFILES.some(p => normalized === p.prefix);
}
