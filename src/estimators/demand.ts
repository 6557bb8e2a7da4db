/**
 * Resource demand estimation for topologies
 */

import { readTopology } from '../topology/reader.js';
import { DEFAULT_KIND, componentProfile, kindProfile, type ResourceProfile } from '../topology/catalog.js';
import { countComponents } from '../analyzers/structure.js';
import { roundTo } from '../utils/units.js';
import type { DemandOptions, NodeDemand, ResourceDemand } from '../types/pricing.js';
import type { ComponentSpec, NodeSpec, TopologyDocument } from '../types/topology.js';

/**
 * Sum of component figures, each multiplied by its count, nested recursively
 */
export function componentDemand(components: ComponentSpec[]): ResourceProfile {
  return components.reduce<ResourceProfile>(
    (total, component) => {
      const profile = componentProfile(component.type);
      const nested = componentDemand(component.components);
      const cpu = (component.resources?.cpu ?? profile.cpu) + nested.cpu;
      const memoryGB = (component.resources?.memoryGB ?? profile.memoryGB) + nested.memoryGB;
      return {
        cpu: total.cpu + component.count * cpu,
        memoryGB: total.memoryGB + component.count * memoryGB,
      };
    },
    { cpu: 0, memoryGB: 0 }
  );
}

/**
 * Demand of a single node.
 * Explicit figures win; a chassis with components contributes only its components;
 * anything else falls back to its kind profile.
 */
export function nodeDemand(node: NodeSpec, options: DemandOptions = {}): NodeDemand {
  const kind = node.kind ?? DEFAULT_KIND;
  const defaults = kindProfile(kind, node.type);
  const components = componentDemand(node.components);

  let base: ResourceProfile;
  let source: NodeDemand['source'];
  if (node.resources) {
    base = {
      cpu: node.resources.cpu ?? defaults.cpu,
      memoryGB: node.resources.memoryGB ?? defaults.memoryGB,
    };
    source = 'explicit';
  } else if (node.components.length > 0) {
    base = { cpu: 0, memoryGB: 0 };
    source = 'components';
  } else {
    base = defaults;
    source = 'kind-default';
  }

  return {
    name: node.name,
    kind,
    vcpus: roundTo(base.cpu + components.cpu + (options.overheadCpuPerNode ?? 0), 2),
    memoryGB: roundTo(base.memoryGB + components.memoryGB + (options.overheadMemoryGBPerNode ?? 0), 2),
    source,
    componentCount: countComponents(node.components),
  };
}

/**
 * Aggregate CPU and memory demand of every node in the topology.
 * Demand is additive: the total is the sum of independent per-node figures.
 */
export function extractDemand(document: TopologyDocument, options: DemandOptions = {}): ResourceDemand {
  const nodes = readTopology(document).nodes.map(node => nodeDemand(node, options));

  return {
    vcpus: roundTo(nodes.reduce((sum, n) => sum + n.vcpus, 0), 2),
    memoryGB: roundTo(nodes.reduce((sum, n) => sum + n.memoryGB, 0), 2),
    nodeCount: nodes.length,
    nodes,
  };
}
