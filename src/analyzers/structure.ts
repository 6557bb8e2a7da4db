/**
 * Topology structure analyzer
 */

import { getNodesSection, getTopologySection, readTopology } from '../topology/reader.js';
import { validate } from '../validators/topology.js';
import type { ComponentSpec, MultiComponentNode, StructureSummary, TopologyDocument } from '../types/topology.js';

/**
 * Component instances including nested ones.
 * An `iom` with count 2 carrying 2 MDAs each counts as 2 + 4.
 */
export function countComponents(components: ComponentSpec[]): number {
  return components.reduce((total, c) => total + c.count * (1 + countComponents(c.components)), 0);
}

/**
 * Summarise a topology without modifying it
 */
export function analyzeStructure(document: TopologyDocument): StructureSummary {
  const view = readTopology(document);
  const validation = validate(document);
  const links = getTopologySection(document)?.['links'];

  const kindCounts = new Map<string, number>();
  const multiComponentNodes: MultiComponentNode[] = [];

  for (const node of view.nodes) {
    const kind = node.kind ?? 'unknown';
    kindCounts.set(kind, (kindCounts.get(kind) ?? 0) + 1);

    if (node.components.length > 0) {
      multiComponentNodes.push({
        name: node.name,
        kind,
        componentCount: countComponents(node.components),
        components: node.components.map(c => (c.count > 1 ? `${c.name} x${c.count}` : c.name)),
      });
    }
  }

  return {
    name: view.name,
    nodeCount: Object.keys(getNodesSection(document) ?? {}).length,
    linkCount: Array.isArray(links) ? links.length : 0,
    nodesByKind: Object.fromEntries(kindCounts),
    multiComponentNodes,
    valid: validation.valid,
    violations: validation.violations,
    warnings: validation.warnings,
  };
}
