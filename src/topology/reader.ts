/**
 * Tolerant typed view over a topology document.
 * Malformed pieces are skipped here; reporting them is the validator's job.
 */

import { isMapping } from './document.js';
import { isComponentType } from './catalog.js';
import { parseCpu, parseMemoryGB } from '../utils/units.js';
import type {
  ComponentSpec,
  LinkEndpoint,
  LinkSpec,
  NodeSpec,
  ResourceBlock,
  TopologyDocument,
  TopologyView,
  YamlMapping,
  YamlValue,
} from '../types/topology.js';

const RESOURCE_BLOCK_KEYS = ['resources', 'resource'];
const CPU_KEYS = ['cpu', 'cpus', 'cores'];
const MEMORY_KEYS = ['memory', 'ram', 'mem'];
const COMPONENT_KEYS = ['components', 'sros', 'lifecycle', 'modules'];

interface Inheritance {
  kinds?: YamlMapping;
  defaults?: YamlMapping;
}

export interface ResourceReading {
  block?: ResourceBlock;
  issues: string[];
}

/**
 * String form of a scalar field; numbers are accepted for fields like `type: 7750`
 */
export function scalarString(value: YamlValue | undefined): string | undefined {
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function stringField(mapping: YamlMapping | undefined, key: string): string | undefined {
  const value = mapping?.[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function firstPresent(mapping: YamlMapping, keys: string[]): [string, YamlValue] | undefined {
  for (const key of keys) {
    const value = mapping[key];
    if (value !== undefined) {
      return [key, value];
    }
  }
  return undefined;
}

// `count: 0` disables a component; only absent or unreadable counts default to 1
function componentCount(value: YamlValue | undefined): number | undefined {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function getTopologySection(document: TopologyDocument): YamlMapping | undefined {
  const section = document['topology'];
  return isMapping(section) ? section : undefined;
}

export function getNodesSection(document: TopologyDocument): YamlMapping | undefined {
  const nodes = getTopologySection(document)?.['nodes'];
  return isMapping(nodes) ? nodes : undefined;
}

export function getInheritance(document: TopologyDocument): Inheritance {
  const section = getTopologySection(document);
  const kinds = section?.['kinds'];
  const defaults = section?.['defaults'];
  return {
    kinds: isMapping(kinds) ? kinds : undefined,
    defaults: isMapping(defaults) ? defaults : undefined,
  };
}

/**
 * Parse a compact resource string such as "4cpu,8gb"
 */
function readCompactResources(text: string, field: string, reading: ResourceReading, block: ResourceBlock): void {
  for (const part of text.split(/[,;\s]+/).filter(Boolean)) {
    const cpuMatch = part.toLowerCase().match(/^(\d+(?:\.\d+)?)(?:v?cpus?|cores?)$/);
    if (cpuMatch?.[1]) {
      block.cpu = parseFloat(cpuMatch[1]);
      continue;
    }
    const memory = parseMemoryGB(part);
    if (memory !== undefined) {
      block.memoryGB = memory;
      continue;
    }
    reading.issues.push(field);
  }
}

/**
 * Read the resource figures declared on a node or component.
 * A `resources` block wins over node-level `cpu`/`memory` fields.
 */
export function readResources(config: YamlMapping, path = ''): ResourceReading {
  const reading: ResourceReading = { issues: [] };
  const block: ResourceBlock = {};
  const prefix = path ? `${path}.` : '';

  const declared = firstPresent(config, RESOURCE_BLOCK_KEYS);
  if (declared) {
    const [key, value] = declared;
    if (isMapping(value)) {
      readFigures(value, `${prefix}${key}`, reading, block);
    } else if (typeof value === 'string') {
      readCompactResources(value, `${prefix}${key}`, reading, block);
    } else if (value !== null) {
      reading.issues.push(`${prefix}${key}`);
    }
  }

  const nodeLevel: ResourceBlock = {};
  readFigures(config, path, reading, nodeLevel);
  block.cpu ??= nodeLevel.cpu;
  block.memoryGB ??= nodeLevel.memoryGB;

  if (block.cpu !== undefined || block.memoryGB !== undefined) {
    reading.block = block;
  }
  return reading;
}

function readFigures(mapping: YamlMapping, path: string, reading: ResourceReading, block: ResourceBlock): void {
  const prefix = path ? `${path}.` : '';

  const cpu = firstPresent(mapping, CPU_KEYS);
  if (cpu) {
    const parsed = parseCpu(cpu[1]);
    if (parsed === undefined) {
      reading.issues.push(`${prefix}${cpu[0]}`);
    } else {
      block.cpu = parsed;
    }
  }

  const memory = firstPresent(mapping, MEMORY_KEYS);
  if (memory) {
    const parsed = parseMemoryGB(memory[1]);
    if (parsed === undefined) {
      reading.issues.push(`${prefix}${memory[0]}`);
    } else {
      block.memoryGB = parsed;
    }
  }
}

function componentFromMapping(config: YamlMapping, name?: string, defaultType?: string): ComponentSpec {
  const type = scalarString(config['type']) ?? name ?? defaultType ?? scalarString(config['name']) ?? 'component';
  return {
    name: name ?? scalarString(config['name']) ?? scalarString(config['slot']) ?? type,
    type,
    count: componentCount(config['count']) ?? 1,
    resources: readResources(config).block,
    components: readComponents(config),
  };
}

function readComponentList(value: YamlValue | undefined, defaultType?: string): ComponentSpec[] {
  if (Array.isArray(value)) {
    return value.flatMap((item): ComponentSpec[] => {
      if (typeof item === 'string') {
        return [{ name: item, type: item, count: 1, components: [] }];
      }
      if (isMapping(item)) {
        return [componentFromMapping(item, undefined, defaultType)];
      }
      return [];
    });
  }

  if (isMapping(value)) {
    return Object.entries(value).map(([name, config]) => namedComponent(name, config));
  }

  return [];
}

function namedComponent(name: string, config: YamlValue): ComponentSpec {
  if (isMapping(config)) {
    return componentFromMapping(config, name);
  }
  if (typeof config === 'string') {
    return { name, type: config, count: 1, components: [] };
  }
  return { name, type: name, count: componentCount(config) ?? 1, components: [] };
}

/**
 * Components declared under `components`/`sros`/`lifecycle`/`modules`,
 * or directly under a component-type key such as `cpm: 2`.
 */
export function readComponents(config: YamlMapping): ComponentSpec[] {
  const components = COMPONENT_KEYS.flatMap(key => readComponentList(config[key]));

  for (const [key, value] of Object.entries(config)) {
    if (!isComponentType(key)) {
      continue;
    }
    if (Array.isArray(value)) {
      components.push(...readComponentList(value, key));
    } else if (isMapping(value) || typeof value === 'number') {
      components.push(namedComponent(key, value));
    }
  }

  return components;
}

/**
 * Node configuration as a mapping. A bare string is read as the node's kind.
 */
export function nodeConfig(value: YamlValue | undefined): YamlMapping {
  if (isMapping(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return { kind: value };
  }
  return {};
}

export function readNode(name: string, value: YamlValue | undefined, inheritance: Inheritance): NodeSpec {
  const config = nodeConfig(value);
  const kind = stringField(config, 'kind') ?? stringField(inheritance.defaults, 'kind');
  const kindEntry = kind && inheritance.kinds && Object.hasOwn(inheritance.kinds, kind) ? inheritance.kinds[kind] : undefined;
  const kindConfig = isMapping(kindEntry) ? kindEntry : undefined;

  const resources = readResources(config, `topology.nodes.${name}`);

  return {
    name,
    kind,
    image: stringField(config, 'image') ?? stringField(kindConfig, 'image') ?? stringField(inheritance.defaults, 'image'),
    type: scalarString(config['type']) ?? scalarString(kindConfig?.['type']) ?? scalarString(inheritance.defaults?.['type']),
    resources: resources.block,
    components: readComponents(config),
    resourceIssues: resources.issues,
  };
}

/**
 * Parse a link endpoint in `node:interface` or `{ node, interface }` form
 */
export function parseEndpoint(value: YamlValue | undefined): LinkEndpoint | undefined {
  if (typeof value === 'string') {
    const separator = value.indexOf(':');
    if (separator <= 0 || separator === value.length - 1) {
      return undefined;
    }
    return { node: value.slice(0, separator), interface: value.slice(separator + 1) };
  }

  if (isMapping(value)) {
    const node = stringField(value, 'node');
    const iface = stringField(value, 'interface');
    return node && iface ? { node, interface: iface } : undefined;
  }

  return undefined;
}

export function readLinks(document: TopologyDocument): LinkSpec[] {
  const links = getTopologySection(document)?.['links'];
  if (!Array.isArray(links)) {
    return [];
  }

  const result: LinkSpec[] = [];
  links.forEach((link, index) => {
    const endpoints = isMapping(link) ? link['endpoints'] : undefined;
    if (!Array.isArray(endpoints)) {
      return;
    }
    const parsed = endpoints.map(parseEndpoint);
    const valid = parsed.filter((endpoint): endpoint is LinkEndpoint => endpoint !== undefined);
    if (valid.length === parsed.length) {
      result.push({ index, endpoints: valid });
    }
  });
  return result;
}

export function readTopology(document: TopologyDocument): TopologyView {
  const inheritance = getInheritance(document);
  const nodes = getNodesSection(document) ?? {};

  return {
    name: scalarString(document['name']) ?? 'unnamed',
    nodes: Object.entries(nodes).map(([name, value]) => readNode(name, value, inheritance)),
    links: readLinks(document),
  };
}
