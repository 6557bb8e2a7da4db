/**
 * Topology repairer
 *
 * Fixes are applied to a copy of the document in priority order:
 * structure first, then missing kinds and images, then malformed
 * node and link configuration.
 */

import { cloneDocument, isMapping, setOwn } from '../topology/document.js';
import { getInheritance, nodeConfig, readNode } from '../topology/reader.js';
import { DEFAULT_KIND, defaultImageFor, isImagelessKind } from '../topology/catalog.js';
import { checkLink, validate } from './topology.js';
import type {
  RepairFix,
  RepairReport,
  RepairResult,
  TopologyDocument,
  YamlMapping,
  YamlValue,
} from '../types/topology.js';

// Top-level keys that belong inside the topology section
const STRAY_KEYS = ['nodes', 'links', 'kinds', 'defaults'];

/**
 * Repair a topology document.
 * A valid document comes back unchanged with an empty report.
 */
export function repair(document: TopologyDocument): RepairResult {
  const before = validate(document);
  const working = cloneDocument(document);

  if (before.valid) {
    return { document: working, report: freezeReport([]), before, after: before };
  }

  const structural: RepairFix[] = [];
  const fields: RepairFix[] = [];
  const malformed: RepairFix[] = [];

  const section = repairTopologySection(working, structural);
  const nodes = repairNodesSection(section, structural);
  normaliseNodes(nodes, malformed);
  repairNodeFields(working, nodes, fields);
  repairLinks(section, new Set(Object.keys(nodes)), malformed);

  return {
    document: working,
    report: freezeReport([...structural, ...fields, ...malformed]),
    before,
    after: validate(working),
  };
}

function freezeReport(fixes: RepairFix[]): RepairReport {
  return Object.freeze(fixes.map(fix => Object.freeze({ ...fix })));
}

/**
 * Copy of `mapping` with `key` set right after `afterKey` (or first when absent)
 */
function withKey(mapping: YamlMapping, key: string, value: YamlValue, afterKey?: string): YamlMapping {
  const result: YamlMapping = {};
  if (afterKey === undefined || !(afterKey in mapping)) {
    setOwn(result, key, value);
  }
  for (const [existingKey, existingValue] of Object.entries(mapping)) {
    if (existingKey === key) {
      continue;
    }
    setOwn(result, existingKey, existingValue);
    if (existingKey === afterKey) {
      setOwn(result, key, value);
    }
  }
  return result;
}

function repairTopologySection(document: TopologyDocument, fixes: RepairFix[]): YamlMapping {
  const existing = document['topology'];
  if (isMapping(existing)) {
    return existing;
  }

  const section: YamlMapping = {};
  const moved: string[] = [];
  const entries = Object.entries(document);
  for (const key of Object.keys(document)) {
    delete document[key];
  }

  // The new section takes the place of the first key it absorbs
  let placed = false;
  for (const [key, value] of entries) {
    if (key === 'topology' || STRAY_KEYS.includes(key)) {
      if (key !== 'topology') {
        setOwn(section, key, value);
        moved.push(`'${key}'`);
      }
      if (!placed) {
        setOwn(document, 'topology', section);
        placed = true;
      }
      continue;
    }
    setOwn(document, key, value);
  }
  if (!placed) {
    setOwn(document, 'topology', section);
  }

  const action =
    existing === undefined
      ? "Added missing 'topology' section"
      : "Replaced non-mapping 'topology' section with a mapping";
  fixes.push({
    kind: 'missing-topology-section',
    field: 'topology',
    description: moved.length > 0 ? `${action} and moved top-level ${moved.join(', ')} into it` : action,
  });

  return section;
}

function repairNodesSection(section: YamlMapping, fixes: RepairFix[]): YamlMapping {
  const existing = section['nodes'];
  if (isMapping(existing)) {
    return existing;
  }

  const nodes: YamlMapping = {};
  setOwn(section, 'nodes', nodes);
  fixes.push({
    kind: 'missing-nodes-section',
    field: 'topology.nodes',
    description:
      existing === undefined
        ? "Added empty 'nodes' section to topology"
        : "Replaced non-mapping 'topology.nodes' with an empty mapping",
  });
  return nodes;
}

/**
 * Turn scalar and list node values into mappings so field repair can run on them
 */
function normaliseNodes(nodes: YamlMapping, fixes: RepairFix[]): void {
  for (const [name, value] of Object.entries(nodes)) {
    if (isMapping(value)) {
      continue;
    }

    const config = nodeConfig(value);
    setOwn(nodes, name, config);
    if (value === null) {
      continue;
    }

    const kind = config['kind'];
    fixes.push({
      kind: 'malformed-node',
      field: `topology.nodes.${name}`,
      description:
        typeof kind === 'string'
          ? `Replaced string configuration of node '${name}' with a mapping of kind '${kind}'`
          : `Replaced malformed configuration of node '${name}' with an empty mapping`,
    });
  }
}

function repairNodeFields(document: TopologyDocument, nodes: YamlMapping, fixes: RepairFix[]): void {
  const inheritance = getInheritance(document);

  for (const [name, value] of Object.entries(nodes)) {
    let config = nodeConfig(value);
    let node = readNode(name, config, inheritance);

    const kind = node.kind ?? DEFAULT_KIND;
    if (!node.kind) {
      config = withKey(config, 'kind', kind);
      // The new kind may bring an image through topology.kinds
      node = readNode(name, config, inheritance);
      fixes.push({
        kind: 'missing-kind',
        field: `topology.nodes.${name}.kind`,
        description: `Set missing kind of node '${name}' to '${kind}'`,
      });
    }

    if (!node.image && !isImagelessKind(kind)) {
      const image = defaultImageFor(kind);
      config = withKey(config, 'image', image, 'kind');
      fixes.push({
        kind: 'missing-image',
        field: `topology.nodes.${name}.image`,
        description: `Set missing image of node '${name}' to '${image}'`,
      });
    }

    setOwn(nodes, name, config);
  }
}

function repairLinks(section: YamlMapping, declared: Set<string>, fixes: RepairFix[]): void {
  const links = section['links'];
  if (links === undefined || links === null) {
    return;
  }

  if (!Array.isArray(links)) {
    setOwn(section, 'links', []);
    fixes.push({
      kind: 'malformed-links-section',
      field: 'topology.links',
      description: "Replaced malformed 'links' section with an empty list",
    });
    return;
  }

  const kept: YamlValue[] = [];
  links.forEach((link, index) => {
    const violation = checkLink(link, index, declared);
    if (!violation) {
      kept.push(link);
      return;
    }
    fixes.push({
      kind: violation.kind,
      field: `topology.links[${index}]`,
      description: `Removed link ${index}: ${violation.message}`,
    });
  });
  setOwn(section, 'links', kept);
}
