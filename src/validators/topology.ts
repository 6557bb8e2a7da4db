/**
 * Topology document validator
 */

import { isMapping } from '../topology/document.js';
import { getInheritance, getTopologySection, parseEndpoint, readNode } from '../topology/reader.js';
import { SPECIAL_ENDPOINTS, isImagelessKind, isKnownKind } from '../topology/catalog.js';
import type {
  TopologyDocument,
  ValidationResult,
  ValidationWarning,
  Violation,
  YamlMapping,
  YamlValue,
} from '../types/topology.js';

/**
 * Validate a parsed topology document.
 * Reports every violation found; never throws.
 */
export function validate(document: TopologyDocument): ValidationResult {
  const violations: Violation[] = [];
  const warnings: ValidationWarning[] = [];

  const section = document['topology'];
  if (!isMapping(section)) {
    violations.push({
      kind: 'missing-topology-section',
      field: 'topology',
      message:
        section === undefined
          ? "Missing required 'topology' section"
          : "'topology' section must be a mapping",
    });
    return { valid: false, violations, warnings };
  }

  const declared = validateNodes(document, section, violations, warnings);
  validateLinks(section, declared, violations, warnings);

  return {
    valid: violations.length === 0,
    violations,
    warnings,
  };
}

/**
 * Validate the nodes section, returning the declared node names
 */
function validateNodes(
  document: TopologyDocument,
  section: YamlMapping,
  violations: Violation[],
  warnings: ValidationWarning[]
): Set<string> {
  const nodes = section['nodes'];
  if (!isMapping(nodes)) {
    violations.push({
      kind: 'missing-nodes-section',
      field: 'topology.nodes',
      message: nodes === undefined ? "Missing 'nodes' in topology section" : "'topology.nodes' must be a mapping",
    });
    return new Set();
  }

  if (Object.keys(nodes).length === 0) {
    warnings.push({ field: 'topology.nodes', message: 'Topology declares no nodes' });
  }

  const inheritance = getInheritance(document);
  for (const [name, value] of Object.entries(nodes)) {
    const field = `topology.nodes.${name}`;

    if (value !== null && !isMapping(value)) {
      violations.push({
        kind: 'malformed-node',
        field,
        message: `Node '${name}' configuration must be a mapping, got ${describe(value)}`,
      });
      continue;
    }

    const node = readNode(name, value, inheritance);
    if (!node.kind) {
      violations.push({ kind: 'missing-kind', field: `${field}.kind`, message: `Node '${name}' missing 'kind' field` });
    } else if (!isKnownKind(node.kind)) {
      warnings.push({ field: `${field}.kind`, message: `Node '${name}' has unknown kind '${node.kind}'` });
    }

    if (!node.image && !isImagelessKind(node.kind ?? '')) {
      violations.push({ kind: 'missing-image', field: `${field}.image`, message: `Node '${name}' missing 'image' field` });
    }

    for (const issue of node.resourceIssues) {
      warnings.push({ field: issue, message: `Node '${name}' has an unparseable resource value; kind defaults apply` });
    }
  }

  return new Set(Object.keys(nodes));
}

function validateLinks(
  section: YamlMapping,
  declared: Set<string>,
  violations: Violation[],
  warnings: ValidationWarning[]
): void {
  const links = section['links'];
  if (links === undefined || links === null) {
    warnings.push({ field: 'topology.links', message: "No 'links' section; nodes are unconnected" });
    return;
  }

  if (!Array.isArray(links)) {
    violations.push({
      kind: 'malformed-links-section',
      field: 'topology.links',
      message: `'topology.links' must be a list, got ${describe(links)}`,
    });
    return;
  }

  links.forEach((link, index) => {
    const violation = checkLink(link, index, declared);
    if (violation) {
      violations.push(violation);
    }
  });
}

/**
 * First problem of a single link, if any
 */
export function checkLink(link: YamlValue, index: number, declared: Set<string>): Violation | undefined {
  const field = `topology.links[${index}]`;
  const endpoints = isMapping(link) ? link['endpoints'] : undefined;

  if (!Array.isArray(endpoints)) {
    return { kind: 'malformed-link', field, message: `Link ${index} missing 'endpoints' list` };
  }
  if (endpoints.length !== 2) {
    return {
      kind: 'malformed-link',
      field: `${field}.endpoints`,
      message: `Link ${index} must have exactly 2 endpoints, found ${endpoints.length}`,
    };
  }

  for (const [position, raw] of endpoints.entries()) {
    const endpoint = parseEndpoint(raw);
    if (!endpoint) {
      return {
        kind: 'malformed-link',
        field: `${field}.endpoints[${position}]`,
        message: `Link ${index} endpoint ${JSON.stringify(raw)} must be 'node:interface'`,
      };
    }
  }

  for (const [position, raw] of endpoints.entries()) {
    const endpoint = parseEndpoint(raw);
    if (endpoint && !declared.has(endpoint.node) && !SPECIAL_ENDPOINTS.includes(endpoint.node)) {
      return {
        kind: 'unknown-link-endpoint',
        field: `${field}.endpoints[${position}]`,
        message: `Link ${index} references undeclared node '${endpoint.node}'`,
      };
    }
  }

  return undefined;
}

function describe(value: YamlValue): string {
  if (Array.isArray(value)) {
    return 'a list';
  }
  if (value === null) {
    return 'null';
  }
  if (isMapping(value)) {
    return 'a mapping';
  }
  return `${typeof value} ${JSON.stringify(value)}`;
}
