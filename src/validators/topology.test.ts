/**
 * Unit tests for the topology validator
 */

import { describe, it, expect } from '@jest/globals';
import { validate } from './topology.js';
import { topology, VALID_TOPOLOGY_YAML, BROKEN_TOPOLOGY_YAML } from '../__tests__/utils.js';

describe('Topology Validator', () => {
  it('should accept a well-formed topology', () => {
    const result = validate(topology(VALID_TOPOLOGY_YAML));

    expect(result.valid).toBe(true);
    expect(result.violations).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('should stop at a missing topology section', () => {
    const result = validate(topology(BROKEN_TOPOLOGY_YAML));

    expect(result.valid).toBe(false);
    expect(result.violations).toEqual([
      { kind: 'missing-topology-section', field: 'topology', message: "Missing required 'topology' section" },
    ]);
  });

  it('should reject a non-mapping topology section', () => {
    const result = validate(topology('topology: [a, b]\n'));

    expect(result.violations[0]?.message).toBe("'topology' section must be a mapping");
  });

  it('should report a missing nodes section', () => {
    const result = validate(topology('topology:\n  links: []\n'));

    expect(result.violations.map(v => v.kind)).toEqual(['missing-nodes-section']);
  });

  it('should report missing kind and image per node', () => {
    const result = validate(
      topology(`topology:
  nodes:
    r1: {}
    r2:
      kind: nokia_sros
  links: []
`)
    );

    expect(result.violations).toEqual([
      { kind: 'missing-kind', field: 'topology.nodes.r1.kind', message: "Node 'r1' missing 'kind' field" },
      { kind: 'missing-image', field: 'topology.nodes.r1.image', message: "Node 'r1' missing 'image' field" },
      { kind: 'missing-image', field: 'topology.nodes.r2.image', message: "Node 'r2' missing 'image' field" },
    ]);
  });

  it('should resolve kind and image through kinds and defaults', () => {
    const result = validate(
      topology(`topology:
  defaults:
    kind: nokia_srlinux
  kinds:
    nokia_srlinux:
      image: ghcr.io/nokia/srlinux:24.3.1
  nodes:
    leaf1: {}
    leaf2:
      type: ixrd3
  links:
    - endpoints: ["leaf1:e1-1", "leaf2:e1-1"]
`)
    );

    expect(result.valid).toBe(true);
  });

  it('should not require an image for bridges', () => {
    const result = validate(
      topology(`topology:
  nodes:
    br0:
      kind: bridge
    h1:
      kind: linux
      image: alpine
  links:
    - endpoints: ["br0:eth1", "h1:eth1"]
`)
    );

    expect(result.valid).toBe(true);
  });

  it('should flag malformed node configuration', () => {
    const result = validate(topology('topology:\n  nodes:\n    r1: nokia_srlinux\n    r2: [1, 2]\n  links: []\n'));

    expect(result.violations).toEqual([
      {
        kind: 'malformed-node',
        field: 'topology.nodes.r1',
        message: 'Node \'r1\' configuration must be a mapping, got string "nokia_srlinux"',
      },
      {
        kind: 'malformed-node',
        field: 'topology.nodes.r2',
        message: "Node 'r2' configuration must be a mapping, got a list",
      },
    ]);
  });

  it('should warn about unknown kinds and a missing links section', () => {
    const result = validate(topology('topology:\n  nodes:\n    x1:\n      kind: vendor_os\n      image: vendor/os\n'));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      { field: 'topology.nodes.x1.kind', message: "Node 'x1' has unknown kind 'vendor_os'" },
      { field: 'topology.links', message: "No 'links' section; nodes are unconnected" },
    ]);
  });

  it('should warn about unparseable resource values', () => {
    const result = validate(
      topology('topology:\n  nodes:\n    h1:\n      kind: linux\n      image: alpine\n      memory: lots\n  links: []\n')
    );

    expect(result.valid).toBe(true);
    expect(result.warnings.map(w => w.field)).toEqual(['topology.nodes.h1.memory']);
  });

  describe('links', () => {
    const nodes = `topology:
  nodes:
    a: {kind: linux, image: alpine}
    b: {kind: linux, image: alpine}
`;

    it('should reject a links section that is not a list', () => {
      const result = validate(topology(`${nodes}  links: {a: b}\n`));

      expect(result.violations).toEqual([
        {
          kind: 'malformed-links-section',
          field: 'topology.links',
          message: "'topology.links' must be a list, got a mapping",
        },
      ]);
    });

    it('should require exactly two endpoints', () => {
      const result = validate(topology(`${nodes}  links:\n    - endpoints: ["a:eth1"]\n`));

      expect(result.violations).toEqual([
        {
          kind: 'malformed-link',
          field: 'topology.links[0].endpoints',
          message: 'Link 0 must have exactly 2 endpoints, found 1',
        },
      ]);
    });

    it('should require node:interface endpoints', () => {
      const result = validate(topology(`${nodes}  links:\n    - endpoints: ["a", "b:eth1"]\n    - {}\n`));

      expect(result.violations.map(v => [v.kind, v.field])).toEqual([
        ['malformed-link', 'topology.links[0].endpoints[0]'],
        ['malformed-link', 'topology.links[1]'],
      ]);
    });

    it('should accept the mapping endpoint form and special endpoints', () => {
      const result = validate(
        topology(`${nodes}  links:
    - endpoints:
        - {node: a, interface: eth1}
        - {node: b, interface: eth1}
    - endpoints: ["a:eth2", "host:veth-a"]
    - endpoints: ["b:eth2", "macvlan:enp0s3"]
`)
      );

      expect(result.valid).toBe(true);
    });

    it('should reject endpoints on undeclared nodes', () => {
      const result = validate(topology(`${nodes}  links:\n    - endpoints: ["a:eth1", "c:eth1"]\n`));

      expect(result.violations).toEqual([
        {
          kind: 'unknown-link-endpoint',
          field: 'topology.links[0].endpoints[1]',
          message: "Link 0 references undeclared node 'c'",
        },
      ]);
    });
  });
});
